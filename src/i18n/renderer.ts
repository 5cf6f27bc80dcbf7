import type { Locale, MessageArgs, MessageFormatter } from "./types.js";
import type { CatalogCache } from "./catalog-cache.js";
import type { I18nLogger } from "./logger.js";
import type { LocaleRegistry } from "./registry.js";
import { fallbackChain, resolveLine, type Resolution } from "./fallback.js";

/**
 * Record of one render() call.
 */
export interface RenderEvent {
  namespace: string;
  key: string;
  /** Locale asked for (explicit or current) */
  requestedLocale: Locale;
  /** Locale the text was resolved from; last tried locale on a miss */
  locale: Locale;
  /** Rendered text, or the "namespace.key" sentinel */
  text: string;
  /** False when the sentinel was returned */
  found: boolean;
  /** Wall-clock timestamps (Date.now()) */
  start: number;
  end: number;
  /** Monotonic render time in milliseconds */
  duration: number;
}

export interface RenderObserver {
  record(event: RenderEvent): void;
}

export interface MessageRendererOptions {
  cache: CatalogCache;
  registry: LocaleRegistry;
  formatter: MessageFormatter;
  logger: I18nLogger;
  observer?: RenderObserver;
}

export class MessageRenderer {
  private observer: RenderObserver | undefined;

  constructor(private readonly options: MessageRendererOptions) {
    this.observer = options.observer;
  }

  setObserver(observer: RenderObserver | undefined): void {
    this.observer = observer;
  }

  getObserver(): RenderObserver | undefined {
    return this.observer;
  }

  /**
   * Resolve a line through the fallback chain without formatting it.
   */
  resolve(namespace: string, key: string, locale?: Locale): Resolution {
    const { cache, registry } = this.options;
    return resolveLine({
      locale: locale ?? registry.getCurrentLocale(),
      namespace,
      key,
      level: registry.getFallbackLevel(),
      defaultLocale: registry.getDefaultLocale(),
      lookup: (target, ns, line) => cache.get(target, ns, line),
    });
  }

  /**
   * Render a line. Returns "namespace.key" when no locale in the chain has it
   * or when it renders to an empty string; returns the raw template when it
   * cannot be formatted.
   */
  render(namespace: string, key: string, args: MessageArgs = [], locale?: Locale): string {
    const start = Date.now();
    const startedAt = performance.now();
    const requestedLocale = locale ?? this.options.registry.getCurrentLocale();
    const resolution = this.resolve(namespace, key, requestedLocale);
    const rendered =
      resolution.text === undefined ? "" : this.format(resolution.locale, resolution.text, args);
    const found = rendered !== "";
    const text = found ? rendered : `${namespace}.${key}`;

    this.observer?.record({
      namespace,
      key,
      requestedLocale,
      locale: resolution.locale,
      text,
      found,
      start,
      end: Date.now(),
      duration: performance.now() - startedAt,
    });
    return text;
  }

  hasLine(namespace: string, key: string, locale?: Locale): boolean {
    return this.resolve(namespace, key, locale).text !== undefined;
  }

  /**
   * Scan a namespace for every locale of the fallback chain.
   */
  preload(namespace: string, locale?: Locale): void {
    const { cache, registry } = this.options;
    const chain = fallbackChain(
      locale ?? registry.getCurrentLocale(),
      registry.getFallbackLevel(),
      registry.getDefaultLocale(),
    );
    for (const target of chain) {
      cache.ensureScanned(target, namespace);
    }
  }

  private format(locale: Locale, template: string, args: MessageArgs): string {
    try {
      return this.options.formatter(locale, template, args);
    } catch (err) {
      this.options.logger.debug(`cannot format "${template}" for ${locale}: ${String(err)}`);
      return template;
    }
  }
}
