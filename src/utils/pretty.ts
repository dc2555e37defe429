// src/utils/pretty.ts
import type { Options } from "prettier";
import type { Logger } from "./logger";

let cachedConfig: Options | null | undefined;

/** Prettier is only loaded when formatting is asked for. */
function loadPrettier() {
  return import("prettier");
}

/** Load user's Prettier config once (respects .prettierrc / package.json / overrides). */
async function loadConfig(filePath: string | undefined, logger?: Logger) {
  if (cachedConfig !== undefined) return cachedConfig;
  try {
    const prettier = await loadPrettier();
    cachedConfig = await prettier.resolveConfig(filePath || process.cwd());
  } catch (e) {
    logger?.debug(`Prettier config not loaded: ${e instanceof Error ? e.message : String(e)}`);
    cachedConfig = null; // fall back to defaults
  }
  return cachedConfig;
}

/** Safe formatter for TypeScript strings. */
export async function prettyTs(
  content: string,
  opts: { filepathHint?: string; logger?: Logger } = {}
): Promise<string> {
  try {
    const base = (await loadConfig(opts.filepathHint, opts.logger)) ?? {};
    const prettier = await loadPrettier();
    return prettier.format(content, {
      ...base,
      parser: "typescript",
    });
  } catch (e) {
    // broken snippet (e.g. a bad source_add): keep the unformatted content
    opts.logger?.warn(`Prettier failed, writing unformatted output: ${e instanceof Error ? e.message : String(e)}`);
    return content;
  }
}
