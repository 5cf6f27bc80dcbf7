/**
 * I18nContext
 *
 * A self-contained localization context: locale configuration, catalog
 * cache and renderer. Contexts share no state, so several can coexist.
 *
 * Usage:
 *   const i18n = new I18nContext({ defaultLocale: "en", directories: ["./locales"] });
 *   i18n.render("home", "hello", ["Mary"]); // => "Hello, Mary!"
 *   i18n.renderDotted("home.hello", ["Mary"], "pt-br");
 */

import type {
  Catalog,
  LineTable,
  Locale,
  MessageArgs,
  MessageFormatter,
  TextDirection,
} from "./types.js";
import { CatalogCache } from "./catalog-cache.js";
import type { FallbackLevel } from "./fallback-level.js";
import { formatCurrency, formatDate, formatMessage, formatOrdinal } from "./formatters.js";
import { FileCatalogLoader, type CatalogLoader } from "./loader.js";
import { getLocaleDirection } from "./locale.js";
import { getChildLogger, type I18nLogger } from "./logger.js";
import { LocaleRegistry } from "./registry.js";
import { MessageRenderer, type RenderObserver } from "./renderer.js";

export interface I18nContextOptions {
  /** Default locale; also the initial current locale */
  defaultLocale: Locale;
  currentLocale?: Locale;
  supportedLocales?: readonly Locale[];
  /** Search directories, first-listed wins on conflicting keys */
  directories?: readonly string[];
  fallbackLevel?: FallbackLevel | number;
  /** Defaults to a FileCatalogLoader reading `<dir>/<locale>/<namespace>.json` */
  loader?: CatalogLoader;
  /** Defaults to ICU MessageFormat */
  formatter?: MessageFormatter;
  observer?: RenderObserver;
  logger?: I18nLogger;
  /** IANA time zone for date(); the system zone when omitted */
  timeZone?: string;
}

export class I18nContext {
  private readonly registry: LocaleRegistry;
  private readonly cache: CatalogCache;
  private readonly renderer: MessageRenderer;
  private readonly loader: CatalogLoader;
  private readonly timeZone: string | undefined;

  constructor(options: I18nContextOptions) {
    const logger = options.logger ?? getChildLogger({ module: "i18n" });
    this.loader = options.loader ?? new FileCatalogLoader();
    this.timeZone = options.timeZone;

    this.registry = new LocaleRegistry({
      defaultLocale: options.defaultLocale,
      onChange: () => this.cache.reindex(),
      logger,
    });
    this.cache = new CatalogCache({
      loader: this.loader,
      getDirectories: () => this.registry.getDirectories(),
      isSupported: (locale) => this.registry.isSupported(locale),
      logger,
    });
    this.renderer = new MessageRenderer({
      cache: this.cache,
      registry: this.registry,
      formatter: options.formatter ?? formatMessage,
      logger,
      observer: options.observer,
    });

    if (options.supportedLocales) {
      this.registry.setSupportedLocales(options.supportedLocales);
    }
    if (options.currentLocale !== undefined) {
      this.registry.setCurrentLocale(options.currentLocale);
    }
    if (options.directories && options.directories.length > 0) {
      this.registry.setDirectories(options.directories);
    }
    if (options.fallbackLevel !== undefined) {
      this.registry.setFallbackLevel(options.fallbackLevel);
    }
  }

  // Locale configuration

  getDefaultLocale(): Locale {
    return this.registry.getDefaultLocale();
  }

  setDefaultLocale(locale: Locale): this {
    this.registry.setDefaultLocale(locale);
    return this;
  }

  getCurrentLocale(): Locale {
    return this.registry.getCurrentLocale();
  }

  setCurrentLocale(locale: Locale): this {
    this.registry.setCurrentLocale(locale);
    return this;
  }

  getSupportedLocales(): Locale[] {
    return this.registry.getSupportedLocales();
  }

  setSupportedLocales(locales: readonly Locale[]): this {
    this.registry.setSupportedLocales(locales);
    return this;
  }

  getDirectories(): string[] {
    return this.registry.getDirectories();
  }

  setDirectories(directories: readonly string[]): this {
    this.registry.setDirectories(directories);
    return this;
  }

  addDirectory(directory: string): this {
    this.registry.addDirectory(directory);
    return this;
  }

  getFallbackLevel(): FallbackLevel {
    return this.registry.getFallbackLevel();
  }

  setFallbackLevel(level: FallbackLevel | number): this {
    this.registry.setFallbackLevel(level);
    return this;
  }

  getCurrentLocaleDirection(): TextDirection {
    return getLocaleDirection(this.registry.getCurrentLocale());
  }

  // Rendering

  render(namespace: string, key: string, args?: MessageArgs, locale?: Locale): string {
    return this.renderer.render(namespace, key, args, locale);
  }

  /**
   * Render a "namespace.key" line, e.g. "home.hello".
   */
  renderDotted(line: string, args?: MessageArgs, locale?: Locale): string {
    const [namespace, key] = splitDottedLine(line);
    return this.renderer.render(namespace, key, args, locale);
  }

  hasLine(namespace: string, key: string, locale?: Locale): boolean {
    return this.renderer.hasLine(namespace, key, locale);
  }

  setObserver(observer: RenderObserver | undefined): this {
    this.renderer.setObserver(observer);
    return this;
  }

  getObserver(): RenderObserver | undefined {
    return this.renderer.getObserver();
  }

  // Lines

  /**
   * Add lines for a locale, e.g. from a database. These always replace lines
   * loaded from files, before or after the files are read.
   */
  addLines(locale: Locale, namespace: string, lines: Catalog): this {
    this.cache.mergeLines(locale, namespace, lines);
    return this;
  }

  getLines(): LineTable {
    return this.cache.snapshot();
  }

  resetLines(): this {
    this.cache.reset();
    return this;
  }

  /**
   * Lines of one namespace in one locale, without fallback.
   */
  getCatalog(namespace: string, locale?: Locale): Catalog {
    const target = locale ?? this.registry.getCurrentLocale();
    this.cache.ensureScanned(target, namespace);
    return this.cache.catalog(target, namespace);
  }

  /**
   * Scan a namespace for every locale of the current fallback chain.
   */
  preload(namespace: string, locale?: Locale): this {
    this.renderer.preload(namespace, locale);
    return this;
  }

  /**
   * Namespaces available in the search directories, sorted.
   */
  listNamespaces(): string[] {
    const namespaces = new Set<string>();
    for (const directory of this.registry.getDirectories()) {
      for (const namespace of this.loader.listNamespaces?.(directory) ?? []) {
        namespaces.add(namespace);
      }
    }
    return [...namespaces].sort();
  }

  /**
   * Run a function against an empty cache, then put the previous lines back.
   */
  withScratchLines<T>(run: () => T): T {
    const saved = this.cache.capture();
    this.cache.reset();
    try {
      return run();
    } finally {
      this.cache.restore(saved);
    }
  }

  // Formatting helpers

  currency(value: number, currency: string, locale?: Locale): string {
    return formatCurrency(value, currency, locale ?? this.registry.getCurrentLocale());
  }

  /**
   * @param style - short (default), medium, long or full
   * @param timeZone - IANA zone; falls back to the context's timeZone option
   */
  date(time: Date | number, style = "short", locale?: Locale, timeZone?: string): string {
    return formatDate(
      time,
      style,
      locale ?? this.registry.getCurrentLocale(),
      timeZone ?? this.timeZone,
    );
  }

  ordinal(value: number, locale?: Locale): string {
    return formatOrdinal(value, locale ?? this.registry.getCurrentLocale());
  }
}

/**
 * Split "namespace.key" at the first dot. Without a dot the whole string is
 * the namespace and the key is empty.
 */
export function splitDottedLine(line: string): [namespace: string, key: string] {
  const index = line.indexOf(".");
  return index === -1 ? [line, ""] : [line.slice(0, index), line.slice(index + 1)];
}
