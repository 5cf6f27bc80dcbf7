/**
 * Lookup tables shipped as JSON beside the sources.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));

const RtlLocalesSchema = z.array(z.string());

/** language => plural category ("one", "two", "few", "other", ...) => suffix */
const OrdinalSuffixesSchema = z.record(z.string(), z.record(z.string(), z.string()));

export type OrdinalSuffixes = z.infer<typeof OrdinalSuffixesSchema>;

function readDataFile<T>(name: string, schema: z.ZodType<T>): T {
  const filePath = join(__dirname, "data", name);
  return schema.parse(JSON.parse(readFileSync(filePath, "utf-8")));
}

let rtlLocales: ReadonlySet<string> | undefined;
let ordinalSuffixes: OrdinalSuffixes | undefined;

export function getRtlLocales(): ReadonlySet<string> {
  rtlLocales ??= new Set(readDataFile("rtl-locales.json", RtlLocalesSchema));
  return rtlLocales;
}

export function getOrdinalSuffixes(): OrdinalSuffixes {
  ordinalSuffixes ??= readDataFile("ordinal-suffixes.json", OrdinalSuffixesSchema);
  return ordinalSuffixes;
}
