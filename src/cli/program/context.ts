import {
  createContextFromConfig,
  detectSystemLocale,
  I18nContext,
  loadI18nConfig,
  parseFallbackLevel,
  type RenderObserver,
} from "../../i18n/index.js";

export type GlobalOptions = {
  config?: string;
  dir?: string[];
  locale?: string;
  defaultLocale?: string;
  supported?: string;
  fallback?: string;
};

function parseLocaleList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((locale) => locale.trim())
    .filter(Boolean);
}

export const DEFAULT_CLI_LOCALE = "en";

/**
 * Build the i18n context for a CLI run.
 *
 * Priority for the current locale: --locale > config currentLocale > env > default locale.
 * --dir and --fallback override the config file.
 */
export function createCliContext(
  options: GlobalOptions,
  params: { env?: NodeJS.ProcessEnv; observer?: RenderObserver } = {},
): I18nContext {
  const env = params.env ?? process.env;
  const supportedLocales = parseLocaleList(options.supported);
  const fallbackLevel =
    options.fallback !== undefined ? parseFallbackLevel(options.fallback) : undefined;

  if (options.config) {
    const config = loadI18nConfig(options.config);
    const context = createContextFromConfig(
      {
        ...config,
        defaultLocale: options.defaultLocale ?? config.defaultLocale,
        supportedLocales: supportedLocales ?? config.supportedLocales,
        directories: options.dir ?? config.directories,
      },
      { observer: params.observer },
    );
    const locale = options.locale ?? config.currentLocale ?? detectSystemLocale(env);
    if (locale !== undefined) {
      context.setCurrentLocale(locale);
    }
    if (fallbackLevel !== undefined) {
      context.setFallbackLevel(fallbackLevel);
    }
    return context;
  }

  return new I18nContext({
    defaultLocale: options.defaultLocale ?? DEFAULT_CLI_LOCALE,
    currentLocale: options.locale ?? detectSystemLocale(env),
    supportedLocales,
    directories: options.dir ?? [],
    fallbackLevel,
    observer: params.observer,
  });
}
