/**
 * Shared i18n type definitions.
 */

/**
 * Locale identifier, e.g. "en" or "pt-br".
 *
 * Any string is accepted; no ISO validation is performed.
 */
export type Locale = string;

/**
 * Flattened message catalog for one (locale, namespace) pair.
 * Example: { "hello": "Hello, {0}!", "cart.items": "{count, plural, one {# item} other {# items}}" }
 */
export type Catalog = Record<string, string>;

/**
 * Catalog file structure before flattening (nested keys)
 * Example: { cart: { items: "..." } }
 */
export type CatalogDict = {
  [key: string]: string | CatalogDict;
};

/**
 * All loaded lines: "locale" => "namespace" => "key" => "text"
 */
export type LineTable = Record<Locale, Record<string, Catalog>>;

/** Values accepted by the message formatter */
export type MessageValue = string | number | boolean | Date | null | undefined;

/**
 * Message arguments.
 *
 * An array fills positional placeholders ({0}, {1}, ...); an object fills named ones.
 */
export type MessageArgs = readonly MessageValue[] | Readonly<Record<string, MessageValue>>;

/**
 * Formats a resolved template for a locale. Throws when the template or
 * arguments cannot be formatted.
 */
export type MessageFormatter = (locale: Locale, template: string, args: MessageArgs) => string;

/** Text directionality */
export type TextDirection = "ltr" | "rtl";
