/**
 * Catalog loaders
 *
 * A loader reads the catalog of one (locale, namespace) pair from one search
 * directory. Loaders do no caching; see CatalogCache.
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { Catalog, CatalogDict, Locale } from "./types.js";
import { I18nError } from "./errors.js";

export interface CatalogLoader {
  /**
   * Read the catalog of a namespace. Returns an empty catalog when the
   * directory has no entry for it; throws an I18nError of kind "io" when the
   * entry exists but cannot be read.
   */
  load(locale: Locale, namespace: string, directory: string): Catalog;

  /**
   * Namespaces available under a directory, across all of its locales.
   */
  listNamespaces?(directory: string): string[];
}

/**
 * Define a line as an own property, so keys such as "__proto__" are kept.
 */
function setLine(catalog: Catalog, key: string, text: string): void {
  Object.defineProperty(catalog, key, { value: text, enumerable: true, writable: true, configurable: true });
}

function mergeInto(target: Catalog, source: Catalog): void {
  for (const [key, text] of Object.entries(source)) {
    setLine(target, key, text);
  }
}

/**
 * Flatten a nested catalog into dot-notation keys
 */
export function flattenCatalog(dict: CatalogDict, source: string, prefix = ""): Catalog {
  const result: Catalog = {};

  for (const [key, value] of Object.entries(dict)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (typeof value === "string") {
      setLine(result, fullKey, value);
    } else if (isPlainObject(value)) {
      mergeInto(result, flattenCatalog(value, source, fullKey));
    } else {
      throw new I18nError("io", `Invalid message "${fullKey}" in ${source}: expected a string`);
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is CatalogDict {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads `<directory>/<locale>/<namespace>.json` files.
 */
export class FileCatalogLoader implements CatalogLoader {
  constructor(private readonly extension = ".json") {}

  load(locale: Locale, namespace: string, directory: string): Catalog {
    const filePath = join(directory, locale, `${namespace}${this.extension}`);

    if (!existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new I18nError("io", `Failed to load catalog file ${filePath}`, { cause: err });
    }

    if (!isPlainObject(parsed)) {
      throw new I18nError("io", `Catalog file ${filePath} must contain an object`);
    }
    return flattenCatalog(parsed, filePath);
  }

  listNamespaces(directory: string): string[] {
    const namespaces = new Set<string>();

    for (const localeEntry of readdirSync(directory, { withFileTypes: true })) {
      if (!localeEntry.isDirectory()) continue;

      for (const file of readdirSync(join(directory, localeEntry.name), { withFileTypes: true })) {
        if (file.isFile() && file.name.endsWith(this.extension)) {
          namespaces.add(file.name.slice(0, -this.extension.length));
        }
      }
    }

    return [...namespaces].sort();
  }
}

export type CatalogQuery = (request: {
  locale: Locale;
  namespace: string;
  directory: string;
}) => Catalog | undefined;

/**
 * Loader backed by a synchronous query function, e.g. a prepared statement
 * against a local database. The query receives the search directory as part
 * of the request and may ignore it.
 */
export class QueryCatalogLoader implements CatalogLoader {
  constructor(
    private readonly query: CatalogQuery,
    private readonly namespaces?: (directory: string) => string[],
  ) {}

  load(locale: Locale, namespace: string, directory: string): Catalog {
    return { ...this.query({ locale, namespace, directory }) };
  }

  listNamespaces(directory: string): string[] {
    return this.namespaces ? [...this.namespaces(directory)].sort() : [];
  }
}

/**
 * Merges several loaders. Later loaders overwrite earlier ones on conflicting keys.
 */
export class CompositeCatalogLoader implements CatalogLoader {
  private readonly loaders: readonly CatalogLoader[];

  constructor(loaders: readonly CatalogLoader[]) {
    this.loaders = [...loaders];
  }

  load(locale: Locale, namespace: string, directory: string): Catalog {
    const result: Catalog = {};
    for (const loader of this.loaders) {
      mergeInto(result, loader.load(locale, namespace, directory));
    }
    return result;
  }

  listNamespaces(directory: string): string[] {
    const namespaces = new Set<string>();
    for (const loader of this.loaders) {
      for (const namespace of loader.listNamespaces?.(directory) ?? []) {
        namespaces.add(namespace);
      }
    }
    return [...namespaces].sort();
  }
}
