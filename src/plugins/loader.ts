import { existsSync, readdirSync, statSync } from "fs";
import path from "path";
import { isPlainObject, PlainObject } from "../composer/document";
import { ConfigError, DocumentParseError, DuplicatePluginError, PluginDirectoryError } from "../errors";
import { PluginManifestSchema } from "../types/config";
import { isDocumentFile, readDocument } from "../utils/documents";
import { Logger, silentLogger } from "../utils/logger";
import type { Plugin } from "./types";

/** A directory is a plugin when it holds one of these (first match wins). */
export const MANIFEST_FILES = ["plugin.yaml", "plugin.yml", "plugin.json", "config.yaml"] as const;

/** Files recorded as plugin-owned source code. */
export const SOURCE_EXTENSIONS = [".ts", ".js"] as const;

export function findManifest(dir: string): string | undefined {
   return MANIFEST_FILES.map(f => path.join(dir, f)).find(f => existsSync(f));
}

/**
 * Build the Plugin record of one directory. Declarations are every other
 * YAML/JSON file of the directory (non-recursive), in file-name order.
 */
export function loadPlugin(dir: string, logger: Logger = silentLogger): Plugin {
   const manifestFile = findManifest(dir);
   if (!manifestFile) throw new PluginDirectoryError(dir);

   const raw = readDocument(manifestFile) ?? {};
   if (!isPlainObject(raw)) throw new DocumentParseError(manifestFile, "manifest must be a mapping");

   const parsed = PluginManifestSchema.safeParse(raw);
   if (!parsed.success) {
      throw new ConfigError(
         manifestFile,
         parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
   }
   const manifest = parsed.data;
   const name = manifest.name ?? path.basename(dir);

   const declarations: PlainObject[] = [];
   const declarationFiles: string[] = [];
   const sourceRefs: string[] = [];
   let lastModified = statSync(manifestFile).mtimeMs;

   const files = readdirSync(dir, { withFileTypes: true })
      .filter(e => e.isFile())
      .map(e => e.name)
      .sort();

   for (const file of files) {
      const full = path.join(dir, file);
      lastModified = Math.max(lastModified, statSync(full).mtimeMs);
      if (full === manifestFile) continue;

      if (isDocumentFile(file)) {
         const doc = readDocument(full);
         if (doc === undefined) {
            logger.debug(`[${name}] Skipping empty document ${file}`);
            continue;
         }
         if (!isPlainObject(doc)) throw new DocumentParseError(full, "declaration document must be a mapping");
         declarations.push(doc);
         declarationFiles.push(full);
         continue;
      }

      if ((SOURCE_EXTENSIONS as readonly string[]).includes(path.extname(file).toLowerCase())) {
         sourceRefs.push(full);
      }
   }

   for (const extra of manifest.sources) {
      const full = path.resolve(dir, extra);
      if (!sourceRefs.includes(full)) sourceRefs.push(full);
   }

   return {
      name,
      version: manifest.version,
      description: manifest.description,
      author: manifest.author,
      license: manifest.license,
      dependsOn: new Set(manifest.depends_on),
      declarations,
      declarationFiles,
      sourceRefs,
      sourceImports: manifest.source_imports,
      directory: dir,
      lastModified,
   };
}

/**
 * Discover every plugin under the given roots, in discovery order (roots in
 * the given order, subdirectories sorted by name).
 */
export function discoverPlugins(roots: readonly string[], logger: Logger = silentLogger): Plugin[] {
   const found = new Map<string, Plugin>();

   for (const root of roots) {
      if (!existsSync(root) || !statSync(root).isDirectory()) throw new PluginDirectoryError(root);

      const dirs = readdirSync(root, { withFileTypes: true })
         .filter(e => e.isDirectory())
         .map(e => e.name)
         .sort();

      for (const entry of dirs) {
         const dir = path.join(root, entry);
         if (!findManifest(dir)) continue; // not a plugin directory

         const plugin = loadPlugin(dir, logger);
         const prev = found.get(plugin.name);
         if (prev) throw new DuplicatePluginError(plugin.name, [prev.directory, dir]);

         logger.debug(`Found plugin ${plugin.name}@${plugin.version} in ${dir}`);
         found.set(plugin.name, plugin);
      }
   }

   return [...found.values()];
}
