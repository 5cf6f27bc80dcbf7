/**
 * In-memory catalog store
 *
 * Holds "locale" => "namespace" => "key" => "text". Catalogs are scanned
 * lazily from every search directory on first request and replaced whole, so
 * a lookup never sees a half-merged namespace.
 *
 * Directory precedence: the first-listed directory wins. Directories are
 * merged in reverse list order so earlier entries overwrite later ones.
 *
 * Lines injected with mergeLines() are recorded as overrides and re-applied
 * on top of file content after every rescan.
 */

import type { Catalog, LineTable, Locale } from "./types.js";
import type { CatalogLoader } from "./loader.js";
import type { I18nLogger } from "./logger.js";

type CatalogMap = Map<string, string>;
type LocaleCatalogs = Map<string, CatalogMap>;

export interface CatalogCacheOptions {
  loader: CatalogLoader;
  getDirectories: () => readonly string[];
  isSupported: (locale: Locale) => boolean;
  logger: I18nLogger;
}

/**
 * Opaque copy of the cache state, see capture() and restore().
 */
export interface CatalogCacheState {
  readonly catalogs: ReadonlyMap<Locale, LocaleCatalogs>;
  readonly scanned: ReadonlyMap<Locale, ReadonlySet<string>>;
  readonly overrides: ReadonlyMap<Locale, LocaleCatalogs>;
}

function cloneScanned(
  source: ReadonlyMap<Locale, ReadonlySet<string>>,
): Map<Locale, Set<string>> {
  return new Map([...source].map(([locale, set]): [Locale, Set<string>] => [locale, new Set(set)]));
}

function cloneCatalogs(source: ReadonlyMap<Locale, LocaleCatalogs>): Map<Locale, LocaleCatalogs> {
  const copy = new Map<Locale, LocaleCatalogs>();
  for (const [locale, namespaces] of source) {
    copy.set(
      locale,
      new Map([...namespaces].map(([ns, lines]): [string, CatalogMap] => [ns, new Map(lines)])),
    );
  }
  return copy;
}

export class CatalogCache {
  private catalogs = new Map<Locale, LocaleCatalogs>();
  private scanned = new Map<Locale, Set<string>>();
  private overrides = new Map<Locale, LocaleCatalogs>();

  constructor(private readonly options: CatalogCacheOptions) {}

  /**
   * Probe already-loaded lines. Never performs I/O.
   */
  lookup(locale: Locale, namespace: string, key: string): string | undefined {
    return this.catalogs.get(locale)?.get(namespace)?.get(key);
  }

  /**
   * Scan-triggering lookup: ensureScanned() then lookup().
   */
  get(locale: Locale, namespace: string, key: string): string | undefined {
    this.ensureScanned(locale, namespace);
    return this.lookup(locale, namespace, key);
  }

  isScanned(locale: Locale, namespace?: string): boolean {
    const namespaces = this.scanned.get(locale);
    if (!namespaces) return false;
    return namespace === undefined || namespaces.has(namespace);
  }

  /**
   * Load a namespace from every search directory, once per locale and
   * namespace. Unsupported locales are never scanned.
   */
  ensureScanned(locale: Locale, namespace: string): void {
    if (this.isScanned(locale, namespace) || !this.options.isSupported(locale)) {
      return;
    }
    const catalog = this.scan(locale, namespace);
    this.store(this.catalogs, locale, namespace, catalog);
    this.markScanned(this.scanned, locale, namespace);
  }

  /**
   * Force-merge lines into a catalog. Injected lines always win over file
   * content, whichever comes first.
   */
  mergeLines(locale: Locale, namespace: string, lines: Catalog): void {
    this.ensureScanned(locale, namespace);

    const entries = Object.entries(lines);
    const overrides = new Map(this.overrides.get(locale)?.get(namespace));
    const catalog = new Map(this.catalogs.get(locale)?.get(namespace));
    for (const [key, text] of entries) {
      overrides.set(key, text);
      catalog.set(key, text);
    }
    this.setCatalog(this.overrides, locale, namespace, overrides);
    this.setCatalog(this.catalogs, locale, namespace, catalog);
    this.options.logger.debug(`merged ${entries.length} line(s) into ${locale}/${namespace}`);
  }

  /**
   * Rescan every namespace already present against the current directories
   * and supported locales, then re-apply overrides. Namespaces never touched
   * stay lazy. The cache is left unchanged if a loader throws.
   */
  reindex(): void {
    const catalogs = new Map<Locale, LocaleCatalogs>();
    const scanned = new Map<Locale, Set<string>>();

    for (const [locale, namespaces] of this.catalogs) {
      for (const namespace of namespaces.keys()) {
        if (this.options.isSupported(locale)) {
          this.store(catalogs, locale, namespace, this.scan(locale, namespace));
          this.markScanned(scanned, locale, namespace);
        } else {
          this.store(catalogs, locale, namespace, this.withOverrides(locale, namespace, new Map()));
        }
      }
    }

    this.catalogs = catalogs;
    this.scanned = scanned;
    this.options.logger.debug(`reindexed ${this.countNamespaces()} namespace(s)`);
  }

  /**
   * Drop all catalogs, scan marks and overrides.
   */
  reset(): void {
    this.catalogs = new Map();
    this.scanned = new Map();
    this.overrides = new Map();
  }

  /**
   * Plain-object copy of every loaded line.
   */
  snapshot(): LineTable {
    return Object.fromEntries(
      [...this.catalogs].map(([locale, namespaces]): [Locale, LineTable[Locale]] => [
        locale,
        Object.fromEntries(
          [...namespaces].map(([namespace, lines]): [string, Catalog] => [namespace, Object.fromEntries(lines)]),
        ),
      ]),
    );
  }

  catalog(locale: Locale, namespace: string): Catalog {
    return Object.fromEntries(this.catalogs.get(locale)?.get(namespace) ?? []);
  }

  capture(): CatalogCacheState {
    return {
      catalogs: cloneCatalogs(this.catalogs),
      scanned: cloneScanned(this.scanned),
      overrides: cloneCatalogs(this.overrides),
    };
  }

  restore(state: CatalogCacheState): void {
    this.catalogs = cloneCatalogs(state.catalogs);
    this.scanned = cloneScanned(state.scanned);
    this.overrides = cloneCatalogs(state.overrides);
  }

  private scan(locale: Locale, namespace: string): CatalogMap {
    const catalog: CatalogMap = new Map();
    const directories = [...this.options.getDirectories()].reverse();

    for (const directory of directories) {
      for (const [key, text] of Object.entries(
        this.options.loader.load(locale, namespace, directory),
      )) {
        catalog.set(key, text);
      }
    }

    this.options.logger.debug(
      `scanned ${locale}/${namespace} in ${directories.length} director${directories.length === 1 ? "y" : "ies"}: ${catalog.size} line(s)`,
    );
    return this.withOverrides(locale, namespace, catalog);
  }

  private withOverrides(locale: Locale, namespace: string, catalog: CatalogMap): CatalogMap {
    for (const [key, text] of this.overrides.get(locale)?.get(namespace) ?? []) {
      catalog.set(key, text);
    }
    return catalog;
  }

  /** Keep only non-empty catalogs so getLines() lists what was actually found. */
  private store(
    target: Map<Locale, LocaleCatalogs>,
    locale: Locale,
    namespace: string,
    catalog: CatalogMap,
  ): void {
    if (catalog.size > 0 || target.get(locale)?.has(namespace)) {
      this.setCatalog(target, locale, namespace, catalog);
    }
  }

  private setCatalog(
    target: Map<Locale, LocaleCatalogs>,
    locale: Locale,
    namespace: string,
    catalog: CatalogMap,
  ): void {
    let namespaces = target.get(locale);
    if (!namespaces) {
      namespaces = new Map();
      target.set(locale, namespaces);
    }
    namespaces.set(namespace, catalog);
  }

  private markScanned(target: Map<Locale, Set<string>>, locale: Locale, namespace: string): void {
    let namespaces = target.get(locale);
    if (!namespaces) {
      namespaces = new Set();
      target.set(locale, namespaces);
    }
    namespaces.add(namespace);
  }

  private countNamespaces(): number {
    let count = 0;
    for (const namespaces of this.catalogs.values()) {
      count += namespaces.size;
    }
    return count;
  }
}
