import { z } from "zod";

/** `"a"` or `["a", "b"]` → `["a", "b"]` */
const stringOrList = z
   .union([z.string(), z.array(z.string())])
   .transform(v => (typeof v === "string" ? [v] : v));

/** YAML happily reads `version: 1.0` as a number. */
const version = (fallback: string) =>
   z
      .union([z.string(), z.number()])
      .default(fallback)
      .transform(v => String(v));

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

/* ------------------------------------------------------------------
 *  Stub groups: one stub file shared by several entities
 * ---------------------------------------------------------------- */
export const StubGroupSchema = z.object({
   stubFile: z.string().min(1),
   tables: z.array(z.string()).optional(),
   include: z.union([z.literal("*"), stringOrList]).optional(),
   exclude: z.array(z.string()).optional(),
   pattern: stringOrList.optional(),
});

export type StubGroup = z.infer<typeof StubGroupSchema>;

/* ------------------------------------------------------------------
 *  Root configuration (compose.config.yaml)
 * ---------------------------------------------------------------- */
export const ComposeConfigSchema = z.object({
   name: z.string().default("app"),
   version: version(""),
   description: z.string().default(""),
   author: z.string().default(""),
   license: z.string().default(""),

   /** plugin roots, relative to the config file */
   plugins: stringOrList.default(["plugins"]),
   /** generated module, relative to the config file */
   output: z.string().default("generated/entities.ts"),
   /** TypeORM driver written into the generated data source */
   engine: z.string().default("postgres"),
   base_class: z
      .string()
      .regex(/^[A-Za-z_$][\w$]*$/, "must be a valid identifier")
      .default("BaseEntity"),

   log_level: z.enum(LOG_LEVELS).default("info"),
   log_file: z.string().optional(),

   /** fail instead of warning when a plugin changes a scalar another plugin set */
   strict_overrides: z.boolean().default(false),
   prettier: z.boolean().default(false),

   stub_dir: z.string().optional(),
   groups: z.array(StubGroupSchema).default([]),

   source_imports: stringOrList.default([]),
   source_add: z.string().default(""),
});

export type RawComposeConfig = z.input<typeof ComposeConfigSchema>;

export interface ComposeConfig extends z.output<typeof ComposeConfigSchema> {
   /** absolute path of the file the config came from ("" when built in memory) */
   configFile: string;
   /** directory every relative path is resolved against */
   rootDir: string;
}

/* ------------------------------------------------------------------
 *  Plugin manifest (plugin.yaml / plugin.json / config.yaml)
 * ---------------------------------------------------------------- */
export const PluginManifestSchema = z
   .object({
      name: z.string().min(1).optional(),
      version: version("0.0.1"),
      description: z.string().default(""),
      author: z.string().default(""),
      license: z.string().default(""),
      depends_on: stringOrList.default([]),
      source_imports: stringOrList.default([]),
      /** extra source files owned by the plugin, relative to its directory */
      sources: stringOrList.default([]),
   })
   .passthrough();

export type PluginManifest = z.infer<typeof PluginManifestSchema>;
