import { existsSync } from "fs";
import { dirname, extname, isAbsolute, resolve } from "path";
import { ConfigError } from "../errors";
import { ComposeConfig, ComposeConfigSchema } from "../types/config";
import { readDocument } from "./documents";

/** Looked up in the working directory, in this order. */
export const CONFIG_FILES = [
   "compose.config.yaml",
   "compose.config.yml",
   "compose.config.json",
   "compose.config.js",
   "compose.config.cjs",
] as const;

/** Environment variable overriding the config path. */
export const CONFIG_ENV = "SCHEMA_COMPOSE_CFG";

const cache = new Map<string, Promise<unknown>>();

function unwrapDefault(mod: unknown): unknown {
   return typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
}

async function loadConfigUniversal(absPath: string): Promise<unknown> {
   const hit = cache.get(absPath);
   if (hit) return hit;

   const p = (async () => {
      const ext = extname(absPath).toLowerCase();

      // JS configs are CommonJS modules; evaluate them as such
      if (ext === ".js" || ext === ".cjs") {
         const mod: unknown = require(absPath);
         return unwrapDefault(mod);
      }

      return readDocument(absPath) ?? {};
   })();

   cache.set(absPath, p);
   return p;
}

/** Forget cached config modules (tests, or a regeneration in the same process). */
export function clearConfigCache(): void {
   cache.clear();
}

/**
 * Pick the config file: explicit path, then `$SCHEMA_COMPOSE_CFG`, then the
 * first of CONFIG_FILES that exists under `cwd`.
 */
export function findConfigFile(explicit?: string, cwd = process.cwd()): string {
   const chosen = explicit ?? process.env[CONFIG_ENV];
   if (chosen) return resolve(cwd, chosen);

   for (const name of CONFIG_FILES) {
      const candidate = resolve(cwd, name);
      if (existsSync(candidate)) return candidate;
   }
   return resolve(cwd, CONFIG_FILES[0]);
}

/** Validate a raw config value and anchor its relative paths at `configFile`. */
export function resolveConfig(raw: unknown, configFile = ""): ComposeConfig {
   const result = ComposeConfigSchema.safeParse(raw ?? {});
   if (!result.success) {
      throw new ConfigError(
         configFile || "<inline>",
         result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
   }

   const rootDir = configFile ? dirname(configFile) : process.cwd();
   const at = (p: string) => (isAbsolute(p) ? p : resolve(rootDir, p));
   const cfg = result.data;

   return {
      ...cfg,
      plugins: cfg.plugins.map(at),
      output: at(cfg.output),
      log_file: cfg.log_file ? at(cfg.log_file) : undefined,
      stub_dir: cfg.stub_dir ? at(cfg.stub_dir) : undefined,
      configFile,
      rootDir,
   };
}

export async function loadConfig(configPath?: string, cwd = process.cwd()): Promise<ComposeConfig> {
   const file = findConfigFile(configPath, cwd);
   if (!existsSync(file)) throw new ConfigError(file, ["config file not found"]);
   return resolveConfig(await loadConfigUniversal(file), file);
}
