import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Language } from "../types/auth.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const catalogSchema = z.object({
  en: z.record(z.string(), z.string()),
  ar: z.record(z.string(), z.string())
});

const catalog = catalogSchema.parse(JSON.parse(readFileSync(join(__dirname, "../i18n/messages.json"), "utf-8")));

export const languageSchema = z.enum(["en", "ar"]);

/** Falls back to English, then to the key itself. Unknown `{placeholders}` stay as written. */
export function translate(language: Language, key: string, vars: Record<string, string | number> = {}): string {
  const template = catalog[language][key] ?? catalog.en[key] ?? key;
  return template.replace(/\{(\w+)\}/g, (match, name: string) => (name in vars ? String(vars[name]) : match));
}
