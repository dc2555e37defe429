import path from 'path';
import { existsSync } from 'fs';
import { Minimatch } from 'minimatch';
import type { StubGroup } from '../types/config';

export interface StubConfig {
   stubDir?: string;          // root folder for all stubs
   groups?: StubGroup[];
}

export type StubType = 'module' | 'entity';

/** helper ── does `name` satisfy pattern? */
const hit = (name: string, pattern: string) =>
   pattern === '*' // wildcard
      ? true
      : new Minimatch(pattern).match(name);

/**
 * Resolve the stub file for the generated module or for one entity.
 *
 * Layout convention:
 *   <stubDir>/
 *     module/
 *       index.stub
 *     entity/
 *       index.stub
 *       User.stub
 *       Post.stub
 *
 * Returns `undefined` when *nothing* can be found — the printer then falls
 * back to its built-in layout.
 */
export function resolveStub(
   cfg: StubConfig | undefined,
   type: StubType,
   name: string
): string | undefined {
   // no stubDir configured → no resolution possible
   if (!cfg?.stubDir) return;

   // root: <stubDir>/<type>
   const root = path.resolve(cfg.stubDir, type);

   // A) direct per-entity override: <root>/<name>.stub
   const direct = path.join(root, `${name}.stub`);
   if (existsSync(direct)) return direct;

   // B) apply groups (entities only)
   const groups = type === 'entity' ? cfg.groups ?? [] : [];

   for (const g of groups) {
      const stubPath = path.join(root, g.stubFile);

      // skip if group stub file itself doesn’t exist
      if (!existsSync(stubPath)) continue;

      // 1. explicit list of entities
      if (g.tables?.includes(name)) return stubPath;

      // 2. include / exclude globs
      if (g.include) {
         const inc =
            g.include === '*' || g.include.some((p) => hit(name, p));
         const exc = g.exclude?.some((p) => hit(name, p)) ?? false;

         if (inc && !exc) return stubPath;
      }

      // 3. standalone pattern(s)
      if (!g.include && g.pattern) {
         if (g.pattern.some((p) => hit(name, p))) return stubPath;
      }
   }

   // C) fallback: <root>/index.stub
   const fallback = path.join(root, 'index.stub');
   return existsSync(fallback) ? fallback : undefined;
}
