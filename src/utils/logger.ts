import { appendFileSync } from "fs";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
   debug(message: string): void;
   info(message: string): void;
   warn(message: string): void;
   error(message: string): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface LoggerOptions {
   level?: LogLevel;
   /** Append to this file instead of writing to the console. */
   file?: string;
   name?: string;
}

/**
 * Console logger with a level gate. When `file` is given, lines go to that
 * file as `name|LEVEL|message`.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
   const threshold = RANK[opts.level ?? "info"];
   const name = opts.name ?? "schema-compose";

   const emit = (level: Exclude<LogLevel, "silent">, message: string) => {
      if (RANK[level] < threshold) return;

      if (opts.file) {
         appendFileSync(opts.file, `${name}|${level.toUpperCase()}|${message}\n`, "utf-8");
         return;
      }

      switch (level) {
         case "debug":
            console.debug(message);
            break;
         case "info":
            console.log(message);
            break;
         case "warn":
            console.warn(`⚠️  ${message}`);
            break;
         case "error":
            console.error(`❌ ${message}`);
            break;
      }
   };

   return {
      debug: m => emit("debug", m),
      info: m => emit("info", m),
      warn: m => emit("warn", m),
      error: m => emit("error", m),
   };
}

/** Logger that drops everything; the default for library calls. */
export const silentLogger: Logger = createLogger({ level: "silent" });
