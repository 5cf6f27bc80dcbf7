/**
 * Diagnostics: render-event collection, fallback classification and a plain
 * text report of the context configuration and reachable lines.
 */

import type { I18nContext } from "./context.js";
import type { Locale } from "./types.js";
import { fallbackChain } from "./fallback.js";
import { fallbackLevelName, type FallbackLevelName } from "./fallback-level.js";
import { parentLocale } from "./locale.js";
import type { RenderEvent, RenderObserver } from "./renderer.js";

export type FallbackClass = FallbackLevelName | "";

export interface AvailableLine {
  namespace: string;
  key: string;
  message: string;
  locale: Locale;
  fallback: FallbackClass;
}

/**
 * Observer that keeps every render event.
 */
export class RenderEventCollector implements RenderObserver {
  private readonly events: RenderEvent[] = [];

  record(event: RenderEvent): void {
    this.events.push(event);
  }

  getEvents(): RenderEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * How a line from `locale` is reached from the current locale.
 */
export function classifyFallback(context: I18nContext, locale: Locale): FallbackClass {
  const currentLocale = context.getCurrentLocale();
  if (locale === currentLocale) {
    return "none";
  }
  if (locale === parentLocale(currentLocale)) {
    return "parent";
  }
  if (locale === context.getDefaultLocale()) {
    return "default";
  }
  return "";
}

/**
 * Every (namespace, key) reachable from the current locale, sorted by
 * namespace then key. The first locale of the fallback chain holding a key
 * provides it. Catalogs are rescanned in a scratch cache so that lines
 * already loaded or injected are left as they were.
 */
export function collectAvailableLines(context: I18nContext): AvailableLine[] {
  const lines = context.withScratchLines(() => {
    for (const namespace of context.listNamespaces()) {
      context.preload(namespace);
    }
    return context.getLines();
  });

  const chain = fallbackChain(
    context.getCurrentLocale(),
    context.getFallbackLevel(),
    context.getDefaultLocale(),
  );

  const seen = new Set<string>();
  const result: AvailableLine[] = [];
  for (const locale of chain) {
    for (const [namespace, messages] of Object.entries(lines[locale] ?? {})) {
      for (const [key, message] of Object.entries(messages)) {
        const id = `${namespace}\u0000${key}`;
        if (seen.has(id)) continue;
        seen.add(id);
        result.push({ namespace, key, message, locale, fallback: classifyFallback(context, locale) });
      }
    }
  }

  return result.sort((a, b) => compare(a.namespace, b.namespace) || compare(a.key, b.key));
}

/**
 * Keys present in the default locale but missing from `locale`, as
 * "namespace.key", without fallback.
 */
export function getMissingKeys(context: I18nContext, locale: Locale): string[] {
  const defaultLocale = context.getDefaultLocale();
  if (locale === defaultLocale) return [];

  const missing: string[] = [];
  for (const namespace of context.listNamespaces()) {
    const target = context.getCatalog(namespace, locale);
    for (const key of Object.keys(context.getCatalog(namespace, defaultLocale)).sort()) {
      if (!Object.hasOwn(target, key)) {
        missing.push(`${namespace}.${key}`);
      }
    }
  }
  return missing;
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Plain text report of a context.
 */
export function buildReport(context: I18nContext, collector?: RenderEventCollector): string {
  const level = context.getFallbackLevel();
  const out: string[] = [
    `Default locale: ${context.getDefaultLocale()}`,
    `Current locale: ${context.getCurrentLocale()}`,
    `Supported locales: ${context.getSupportedLocales().join(", ")}`,
    `Fallback level: ${level} (${fallbackLevelName(level)})`,
    "",
    "Directories:",
  ];

  const directories = context.getDirectories();
  if (directories.length === 0) {
    out.push("  No directory set.");
  } else {
    out.push(...directories.map((directory) => `  ${directory}`));
  }

  out.push("", "Lines:");
  const lines = collectAvailableLines(context);
  if (lines.length === 0) {
    out.push("  No message lines available.");
  } else {
    out.push(
      `  There are ${lines.length} message lines available to the current locale (${context.getCurrentLocale()}).`,
    );
    for (const line of lines) {
      out.push(`  ${line.namespace}.${line.key} [${line.locale}, ${line.fallback || "-"}] ${line.message}`);
    }
  }

  if (collector) {
    out.push("", "Rendered messages:");
    const events = collector.getEvents();
    if (events.length === 0) {
      out.push("  No message has been rendered.");
    } else {
      for (const event of events) {
        const status = event.found ? event.locale : "missing";
        out.push(
          `  ${event.namespace}.${event.key} [${status}] ${event.text} (${event.duration.toFixed(3)} ms)`,
        );
      }
    }
  }

  return out.join("\n");
}
