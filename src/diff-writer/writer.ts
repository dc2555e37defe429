import { existsSync, mkdirSync, readFileSync, utimesSync, writeFileSync } from "fs";
import path from "path";
import { prettyTs } from "../utils/pretty";
import { Logger, silentLogger } from "../utils/logger";

export type WriteResult = "written" | "unchanged" | "dry-run";

export interface WriteOptions {
   /** run the output through prettier first */
   prettier?: boolean;
   /** report what would happen, touch nothing */
   dryRun?: boolean;
   /** mtime given to an unchanged file (default: now) */
   touchTo?: Date;
   logger?: Logger;
}

/**
 * Write a generated artifact. The file is never merged with what is on disk
 * (it is not meant to be edited). Unchanged content is not rewritten, but the
 * file is touched so the freshness check sees it as newer than its sources.
 *
 * @param filePath  destination file
 * @param content   freshly generated FULL text
 */
export async function writeArtifact(
   filePath: string,
   content: string,
   opts: WriteOptions = {}
): Promise<WriteResult> {
   const logger = opts.logger ?? silentLogger;
   const text = opts.prettier ? await prettyTs(content, { filepathHint: filePath, logger }) : content;
   const rel = path.relative(process.cwd(), filePath) || filePath;

   const current = existsSync(filePath) ? readFileSync(filePath, "utf-8") : null;
   if (current === text) {
      if (!opts.dryRun) {
         const at = opts.touchTo ?? new Date();
         utimesSync(filePath, at, at);
      }
      logger.info(`🟡 ${rel} is unchanged`);
      return "unchanged";
   }

   if (opts.dryRun) {
      logger.info(`➡️  Would write ${rel} (${text.split("\n").length} lines)`);
      return "dry-run";
   }

   mkdirSync(path.dirname(filePath), { recursive: true });
   writeFileSync(filePath, text, "utf-8");
   logger.info(`✅ Wrote ${rel}`);
   return "written";
}
