/**
 * Locale-aware formatting
 *
 * Messages go through ICU MessageFormat (intl-messageformat); currency,
 * dates and ordinals use the Intl API directly.
 */

import { IntlMessageFormat } from "intl-messageformat";
import { z } from "zod";
import type { Locale, MessageArgs, MessageValue } from "./types.js";
import { getOrdinalSuffixes } from "./data.js";
import { I18nError } from "./errors.js";
import { toIntlLocale } from "./locale.js";

export const DateStyleSchema = z.enum(["short", "medium", "long", "full"]);

export type DateStyle = z.infer<typeof DateStyleSchema>;

function isPositional(args: MessageArgs): args is readonly MessageValue[] {
  return Array.isArray(args);
}

/**
 * Positional arguments become named values "0", "1", ...
 */
export function toMessageValues(args: MessageArgs): Record<string, MessageValue> {
  if (isPositional(args)) {
    return Object.fromEntries(args.map((value, index): [string, MessageValue] => [String(index), value]));
  }
  return { ...args };
}

/**
 * Format an ICU message. Throws on malformed templates and missing arguments.
 */
export function formatMessage(locale: Locale, template: string, args: MessageArgs): string {
  const formatter = new IntlMessageFormat(template, toIntlLocale(locale), undefined, {
    ignoreTag: true,
  });
  const output = formatter.format<string>(toMessageValues(args));
  return Array.isArray(output) ? output.join("") : output;
}

function withIntl<T>(what: string, locale: Locale, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof RangeError) {
      throw new I18nError("invalid_value", `Cannot format ${what} for locale ${locale}: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Format a money value, e.g. formatCurrency(10.5, "USD", "en") => "$10.50"
 */
export function formatCurrency(value: number, currency: string, locale: Locale): string {
  return withIntl("currency", locale, () =>
    new Intl.NumberFormat(toIntlLocale(locale), { style: "currency", currency }).format(value),
  );
}

/**
 * Format a date with one of the short, medium, long or full styles.
 *
 * @param time - Date or epoch milliseconds
 */
export function formatDate(
  time: Date | number,
  style: string,
  locale: Locale,
  timeZone?: string,
): string {
  const parsed = DateStyleSchema.safeParse(style);
  if (!parsed.success) {
    throw new I18nError("invalid_value", `Invalid date style format: ${style}`);
  }
  return withIntl("date", locale, () =>
    new Intl.DateTimeFormat(toIntlLocale(locale), { dateStyle: parsed.data, timeZone }).format(time),
  );
}

/**
 * Format an ordinal number, e.g. formatOrdinal(2, "en") => "2nd", formatOrdinal(2, "pt-br") => "2º"
 *
 * Languages without a suffix table get the plain localized number.
 */
export function formatOrdinal(value: number, locale: Locale): string {
  const intlLocale = toIntlLocale(locale);
  return withIntl("ordinal", locale, () => {
    const number = new Intl.NumberFormat(intlLocale).format(value);
    const [language] = intlLocale.toLowerCase().split("-");
    const suffixes = getOrdinalSuffixes()[language];
    if (!suffixes) {
      return number;
    }
    const category = new Intl.PluralRules(intlLocale, { type: "ordinal" }).select(value);
    return `${number}${suffixes[category] ?? suffixes.other ?? ""}`;
  });
}
