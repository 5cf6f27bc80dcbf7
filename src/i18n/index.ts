/**
 * locale-lines
 *
 * Message catalog lookup with locale fallback and ICU message formatting.
 *
 * Usage:
 *   import { I18nContext, FallbackLevel } from "locale-lines";
 *
 *   const i18n = new I18nContext({
 *     defaultLocale: "en",
 *     supportedLocales: ["pt", "pt-br"],
 *     directories: ["/app/locales"],
 *   });
 *
 *   i18n.render("tests", "hello", ["Mary"]); // => "Hello, Mary!"
 *   i18n.render("tests", "unknown"); // => "tests.unknown"
 *   i18n.setFallbackLevel(FallbackLevel.Parent);
 */

export { I18nContext, splitDottedLine } from "./context.js";
export type { I18nContextOptions } from "./context.js";
export { CatalogCache } from "./catalog-cache.js";
export type { CatalogCacheOptions, CatalogCacheState } from "./catalog-cache.js";
export { createContextFromConfig, I18nConfigSchema, loadI18nConfig, parseI18nConfig } from "./config.js";
export type { I18nConfig } from "./config.js";
export {
  buildReport,
  classifyFallback,
  collectAvailableLines,
  getMissingKeys,
  RenderEventCollector,
} from "./diagnostics.js";
export type { AvailableLine, FallbackClass } from "./diagnostics.js";
export { I18nError, isI18nError } from "./errors.js";
export type { I18nErrorKind } from "./errors.js";
export { fallbackChain, resolveFallback, resolveLine } from "./fallback.js";
export type { FallbackRequest, LineLookup, Resolution } from "./fallback.js";
export {
  FallbackLevel,
  fallbackLevelFromInt,
  fallbackLevelName,
  parseFallbackLevel,
} from "./fallback-level.js";
export type { FallbackLevelName } from "./fallback-level.js";
export {
  DateStyleSchema,
  formatCurrency,
  formatDate,
  formatMessage,
  formatOrdinal,
} from "./formatters.js";
export type { DateStyle } from "./formatters.js";
export {
  CompositeCatalogLoader,
  FileCatalogLoader,
  flattenCatalog,
  QueryCatalogLoader,
} from "./loader.js";
export type { CatalogLoader, CatalogQuery } from "./loader.js";
export { detectSystemLocale, getLocaleDirection, parentLocale } from "./locale.js";
export { getChildLogger } from "./logger.js";
export type { I18nLogger } from "./logger.js";
export { LocaleRegistry, resolveDirectories } from "./registry.js";
export { MessageRenderer } from "./renderer.js";
export type { RenderEvent, RenderObserver } from "./renderer.js";
export type {
  Catalog,
  CatalogDict,
  LineTable,
  Locale,
  MessageArgs,
  MessageFormatter,
  MessageValue,
  TextDirection,
} from "./types.js";
