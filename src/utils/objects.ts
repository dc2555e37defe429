import { isPlainObject, PlainObject, PlainValue } from "../composer/document";

/**
 * Merge `over` onto `base` and return a new object. Nested objects merge key by
 * key; everything else (lists included) is replaced by the `over` value.
 */
export function deepMerge(base: Readonly<PlainObject>, over: Readonly<PlainObject>): PlainObject {
   const out: PlainObject = { ...base };
   for (const [key, value] of Object.entries(over)) {
      const prev = out[key];
      out[key] = isPlainObject(prev) && isPlainObject(value) ? deepMerge(prev, value) : value;
   }
   return out;
}

/** Copy of `obj` without `keys`. */
export function omit(obj: Readonly<PlainObject>, keys: readonly string[]): PlainObject {
   const out: PlainObject = {};
   for (const [k, v] of Object.entries(obj)) {
      if (!keys.includes(k)) out[k] = v;
   }
   return out;
}

/** Normalise `"a"` / `["a", "b"]` / missing into a list of strings; other entries are dropped. */
export function stringList(value: PlainValue | undefined): string[] {
   if (value === undefined || value === null) return [];
   if (typeof value === "string") return [value];
   if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
   return [];
}
