/**
 * Locale and search-path configuration of an i18n context.
 *
 * Every mutator except setFallbackLevel() triggers a reindex through the
 * onChange callback. When the reindex throws, the previous configuration is
 * restored before the error propagates.
 */

import { realpathSync, statSync } from "node:fs";
import { sep } from "node:path";
import type { Locale } from "./types.js";
import type { I18nLogger } from "./logger.js";
import { I18nError } from "./errors.js";
import { FallbackLevel, fallbackLevelFromInt, fallbackLevelName } from "./fallback-level.js";
import { normalizeSupportedLocales } from "./locale.js";

export interface LocaleRegistryOptions {
  defaultLocale: Locale;
  onChange: () => void;
  logger: I18nLogger;
}

type RegistryState = {
  defaultLocale: Locale;
  currentLocale: Locale;
  supportedLocales: Locale[];
  directories: string[];
};

/**
 * Resolve directory paths to absolute real paths with a trailing separator.
 * Throws on the first inaccessible path without returning a partial list.
 */
export function resolveDirectories(directories: readonly string[]): string[] {
  const resolved: string[] = [];

  for (const directory of directories) {
    let realPath: string;
    try {
      realPath = realpathSync(directory);
    } catch (err) {
      throw new I18nError("config", `Directory path inaccessible: ${directory}`, { cause: err });
    }
    if (!statSync(realPath).isDirectory()) {
      throw new I18nError("config", `Directory path inaccessible: ${directory}`);
    }
    resolved.push(realPath.endsWith(sep) ? realPath : `${realPath}${sep}`);
  }

  return [...new Set(resolved)];
}

export class LocaleRegistry {
  private state: RegistryState;
  private fallbackLevel: FallbackLevel = FallbackLevel.Default;
  private readonly onChange: () => void;
  private readonly logger: I18nLogger;

  constructor(options: LocaleRegistryOptions) {
    this.onChange = options.onChange;
    this.logger = options.logger;
    this.state = {
      defaultLocale: options.defaultLocale,
      currentLocale: options.defaultLocale,
      supportedLocales: [options.defaultLocale],
      directories: [],
    };
  }

  getDefaultLocale(): Locale {
    return this.state.defaultLocale;
  }

  getCurrentLocale(): Locale {
    return this.state.currentLocale;
  }

  getSupportedLocales(): Locale[] {
    return [...this.state.supportedLocales];
  }

  getDirectories(): string[] {
    return [...this.state.directories];
  }

  getFallbackLevel(): FallbackLevel {
    return this.fallbackLevel;
  }

  isSupported(locale: Locale): boolean {
    return this.state.supportedLocales.includes(locale);
  }

  /**
   * Set the default locale. It becomes one of the supported locales.
   */
  setDefaultLocale(locale: Locale): void {
    this.commit((state) => ({
      ...state,
      defaultLocale: locale,
      supportedLocales: normalizeSupportedLocales(state.supportedLocales, locale),
    }));
  }

  /**
   * Set the current locale. It becomes one of the supported locales.
   */
  setCurrentLocale(locale: Locale): void {
    this.commit((state) => ({
      ...state,
      currentLocale: locale,
      supportedLocales: normalizeSupportedLocales(
        [...state.supportedLocales, locale],
        state.defaultLocale,
      ),
    }));
  }

  /**
   * Replace the supported locales. The default locale is always kept; the
   * current one is dropped unless listed.
   */
  setSupportedLocales(locales: readonly Locale[]): void {
    this.commit((state) => ({
      ...state,
      supportedLocales: normalizeSupportedLocales(locales, state.defaultLocale),
    }));
  }

  /**
   * Replace the search directories. All paths must be existing directories.
   */
  setDirectories(directories: readonly string[]): void {
    const resolved = resolveDirectories(directories);
    this.commit((state) => ({ ...state, directories: resolved }));
  }

  /**
   * Prepend a search directory. With first-listed precedence the new
   * directory wins on conflicting keys.
   */
  addDirectory(directory: string): void {
    this.setDirectories([directory, ...this.state.directories]);
  }

  setFallbackLevel(level: FallbackLevel | number): void {
    this.fallbackLevel = fallbackLevelFromInt(level);
    this.logger.debug(`fallback level set to ${this.fallbackLevel} (${fallbackLevelName(this.fallbackLevel)})`);
  }

  private commit(update: (state: RegistryState) => RegistryState): void {
    const previous = this.state;
    this.state = update(previous);
    try {
      this.onChange();
    } catch (err) {
      this.state = previous;
      throw err;
    }
    this.logger.debug(
      `locales: default=${this.state.defaultLocale} current=${this.state.currentLocale} supported=[${this.state.supportedLocales.join(", ")}] directories=${this.state.directories.length}`,
    );
  }
}
