import { readFileSync } from "fs";
import { extname } from "path";
import { parse } from "yaml";
import { asPlainValue, PlainValue } from "../composer/document";
import { DocumentParseError } from "../errors";

/** Extensions read as declaration documents. */
export const DOCUMENT_EXTENSIONS = [".yaml", ".yml", ".json"] as const;

export function isDocumentFile(file: string): boolean {
   return (DOCUMENT_EXTENSIONS as readonly string[]).includes(extname(file).toLowerCase());
}

const reason = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Parse a YAML or JSON document. Returns `undefined` for an empty file;
 * throws DocumentParseError (with the file path) for anything unreadable.
 */
export function readDocument(file: string): PlainValue | undefined {
   const text = readFileSync(file, "utf-8");

   let parsed: unknown;
   try {
      parsed = extname(file).toLowerCase() === ".json" ? JSON.parse(text) : parse(text);
   } catch (e) {
      throw new DocumentParseError(file, reason(e));
   }
   if (parsed === undefined || parsed === null) return undefined;

   try {
      return asPlainValue(parsed);
   } catch (e) {
      throw new DocumentParseError(file, reason(e));
   }
}
