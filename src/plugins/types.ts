import type { PlainObject } from "../composer/document";

/**
 * A plugin directory after discovery. Immutable for the whole composition pass.
 */
export interface Plugin {
   readonly name: string;
   readonly version: string;
   readonly description: string;
   readonly author: string;
   readonly license: string;
   readonly dependsOn: ReadonlySet<string>;
   /** Parsed declaration documents, in file-name order. */
   readonly declarations: readonly PlainObject[];
   readonly declarationFiles: readonly string[];
   /** Non-declaration source files owned by the plugin. */
   readonly sourceRefs: readonly string[];
   /** Raw import lines the plugin adds to the generated module. */
   readonly sourceImports: readonly string[];
   readonly directory: string;
   /** Latest mtime (ms) over every file of the plugin. */
   readonly lastModified: number;
}
