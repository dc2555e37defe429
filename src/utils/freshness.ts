import { existsSync, statSync } from "fs";
import type { Plugin } from "../plugins/types";

/** Latest mtime (ms) over every plugin and every existing extra file; 0 when there is nothing. */
export function latestModification(plugins: readonly Plugin[], extraFiles: readonly string[] = []): number {
   let latest = 0;
   for (const plugin of plugins) latest = Math.max(latest, plugin.lastModified);
   for (const file of extraFiles) {
      if (existsSync(file)) latest = Math.max(latest, statSync(file).mtimeMs);
   }
   return latest;
}

/**
 * True when `artifact` is missing or older than any plugin file (or any of
 * `extraFiles`, e.g. the root config). Content is not looked at.
 */
export function shouldRegenerate(
   artifact: string,
   plugins: readonly Plugin[],
   extraFiles: readonly string[] = []
): boolean {
   if (!existsSync(artifact)) return true;
   return latestModification(plugins, extraFiles) > statSync(artifact).mtimeMs;
}
