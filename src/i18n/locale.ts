/**
 * Locale identifier helpers.
 */

import type { Locale, TextDirection } from "./types.js";
import { getRtlLocales } from "./data.js";

/**
 * Parent of a locale: the part before the first "-".
 *
 * "pt-br" -> "pt". Locales without a separator have no parent.
 */
export function parentLocale(locale: Locale): Locale | undefined {
  const index = locale.indexOf("-");
  return index > 0 ? locale.slice(0, index) : undefined;
}

/**
 * Convert a locale identifier to a tag the Intl API accepts ("uz_AF" -> "uz-AF").
 */
export function toIntlLocale(locale: Locale): string {
  return locale.replace(/_/g, "-");
}

/**
 * Sort and deduplicate a locale list, always including the default locale.
 */
export function normalizeSupportedLocales(
  locales: readonly Locale[],
  defaultLocale: Locale,
): Locale[] {
  return [...new Set([...locales, defaultLocale])].sort();
}

/**
 * Text directionality of a locale.
 */
export function getLocaleDirection(locale: Locale): TextDirection {
  const normalized = locale.toLowerCase().replace(/_/g, "-");
  return getRtlLocales().has(normalized) ? "rtl" : "ltr";
}

/**
 * Detect the user's locale from environment variables
 *
 * Checks: LOCALE_LINES_LANGUAGE, LANG, LC_ALL, LC_MESSAGES
 * Returns undefined when none is set (or only "C"/"POSIX").
 */
export function detectSystemLocale(env: NodeJS.ProcessEnv = process.env): Locale | undefined {
  const candidates = [env.LOCALE_LINES_LANGUAGE, env.LANG, env.LC_ALL, env.LC_MESSAGES];

  for (const candidate of candidates) {
    if (!candidate) continue;

    // Handle formats like "pt_BR.UTF-8", "en_US", "pt"
    const [withoutEncoding] = candidate.split(".");
    const normalized = withoutEncoding.trim().toLowerCase().replace(/_/g, "-");
    if (!normalized || normalized === "c" || normalized === "posix") continue;

    return normalized;
  }

  return undefined;
}
