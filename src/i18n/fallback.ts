/**
 * Locale fallback chain
 *
 * Primary -> Parent -> Default. The parent step is taken only when the
 * locale has a parent ("pt-br" -> "pt"); the default step only when the
 * locale reached so far is not already the default one. There is never more
 * than one parent level.
 */

import type { Locale } from "./types.js";
import { FallbackLevel } from "./fallback-level.js";
import { parentLocale } from "./locale.js";

export type LineLookup = (locale: Locale, namespace: string, key: string) => string | undefined;

export interface FallbackRequest {
  locale: Locale;
  namespace: string;
  key: string;
  level: FallbackLevel;
  defaultLocale: Locale;
  lookup: LineLookup;
}

export interface Resolution {
  /** Locale the text came from, or the last one tried when text is undefined */
  locale: Locale;
  text: string | undefined;
}

/**
 * Walk the Parent and Default states after a primary miss.
 */
export function resolveFallback(request: FallbackRequest): Resolution {
  const { namespace, key, level, defaultLocale, lookup } = request;
  let locale = request.locale;
  let text: string | undefined;

  if (level >= FallbackLevel.Parent) {
    const parent = parentLocale(locale);
    if (parent !== undefined) {
      locale = parent;
      text = lookup(locale, namespace, key);
    }
  }

  if (text === undefined && level >= FallbackLevel.Default && locale !== defaultLocale) {
    locale = defaultLocale;
    text = lookup(locale, namespace, key);
  }

  return { locale, text };
}

/**
 * Full resolution: the requested locale first, then the fallback chain.
 */
export function resolveLine(request: FallbackRequest): Resolution {
  const text = request.lookup(request.locale, request.namespace, request.key);
  if (text !== undefined) {
    return { locale: request.locale, text };
  }
  return resolveFallback(request);
}

/**
 * Locales a lookup would visit, in order, for a line found nowhere.
 */
export function fallbackChain(
  locale: Locale,
  level: FallbackLevel,
  defaultLocale: Locale,
): Locale[] {
  const visited: Locale[] = [locale];
  resolveFallback({
    locale,
    namespace: "",
    key: "",
    level,
    defaultLocale,
    lookup: (tried) => {
      visited.push(tried);
      return undefined;
    },
  });
  return visited;
}
