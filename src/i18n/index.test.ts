import { realpathSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { beforeEach, describe, expect, it } from "vitest";
import {
  FallbackLevel,
  I18nContext,
  I18nError,
  isI18nError,
  RenderEventCollector,
  splitDottedLine,
} from "./index.js";

const fixtures = path.join(path.dirname(fileURLToPath(import.meta.url)), "test-fixtures");
const LOCALES_1 = path.join(fixtures, "locales-1");
const LOCALES_2 = path.join(fixtures, "locales-2");
const LOCALES_BROKEN = path.join(fixtures, "locales-broken");
const LOCALES_NESTED = path.join(fixtures, "locales-nested");
const LOCALES_EDGE = path.join(fixtures, "locales-edge");

function normalized(directory: string): string {
  return `${realpathSync(directory)}${path.sep}`;
}

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("I18nContext", () => {
  let i18n: I18nContext;

  beforeEach(() => {
    i18n = new I18nContext({ defaultLocale: "en", directories: [LOCALES_1] });
  });

  describe("render", () => {
    it("returns the namespace.key sentinel for unknown lines", () => {
      expect(i18n.render("tests", "unknown")).toBe("tests.unknown");
      expect(i18n.render("tests", "unknown", [], "pt")).toBe("tests.unknown");
    });

    it("renders lines of the current locale", () => {
      expect(i18n.render("tests", "bye")).toBe("Bye!");
      expect(i18n.render("tests", "hello", ["Mary"])).toBe("Hello, Mary!");
    });

    it("returns the raw template when arguments are missing", () => {
      expect(i18n.render("tests", "hello")).toBe("Hello, {0}!");
      expect(i18n.render("tests", "hello", [], "pt")).toBe("Hello, {0}!");
    });

    it("falls back to the default locale for unsupported locales", () => {
      expect(i18n.render("tests", "bye", [], "pt")).toBe("Bye!");
      expect(i18n.render("tests", "hello", ["Mary"], "pt")).toBe("Hello, Mary!");
    });

    it("uses lines of newly supported locales and their children", () => {
      i18n.setSupportedLocales(["pt"]);
      expect(i18n.render("tests", "unknown", [], "pt")).toBe("tests.unknown");
      expect(i18n.render("tests", "bye", [], "pt")).toBe("Bye!");
      expect(i18n.render("tests", "hello", ["Mary"], "pt")).toBe("Olá, Mary!");
      expect(i18n.render("tests", "hello", ["Mary"], "pt-br")).toBe("Olá, Mary!");
    });

    it("formats numbers given as positional arguments", () => {
      expect(i18n.render("tests", "hello", [42])).toBe("Hello, 42!");
    });
  });

  describe("renderDotted", () => {
    it("splits namespace and key at the first dot", () => {
      expect(i18n.renderDotted("tests.bye")).toBe("Bye!");
      expect(i18n.renderDotted("tests.hello", ["Mary"])).toBe("Hello, Mary!");
      expect(i18n.renderDotted("tests.unknown", [], "pt")).toBe("tests.unknown");
    });

    it("treats a line without a dot as a namespace with an empty key", () => {
      expect(splitDottedLine("tests")).toEqual(["tests", ""]);
      expect(i18n.renderDotted("tests")).toBe("tests.");
    });
  });

  describe("unusual lines", () => {
    beforeEach(() => {
      i18n.setDirectories([LOCALES_EDGE]);
    });

    it("keeps a line named __proto__", () => {
      expect(i18n.render("p", "__proto__")).toBe("Proto line");
      expect(i18n.hasLine("p", "__proto__")).toBe(true);
      expect(Object.hasOwn(i18n.getLines().en.p, "__proto__")).toBe(true);
    });

    it("returns the line id for empty text", () => {
      expect(i18n.render("p", "empty")).toBe("p.empty");
      expect(i18n.render("p", "name", { name: "" })).toBe("p.name");
      expect(i18n.render("p", "name", { name: "Ana" })).toBe("Ana");
      expect(i18n.hasLine("p", "empty")).toBe(true);
    });
  });

  describe("ICU messages", () => {
    beforeEach(() => {
      i18n.setDirectories([LOCALES_NESTED]);
    });

    it("flattens nested catalogs into dotted keys", () => {
      expect(i18n.renderDotted("shop.cart.empty")).toBe("Your cart is empty.");
    });

    it("formats plurals with named arguments", () => {
      expect(i18n.render("shop", "cart.items", { count: 0 })).toBe("No items");
      expect(i18n.render("shop", "cart.items", { count: 1 })).toBe("1 item");
      expect(i18n.render("shop", "cart.items", { count: 5 })).toBe("5 items");
    });

    it("formats ordinal selections", () => {
      expect(i18n.render("shop", "place", { place: 2 })).toBe("You finished 2nd");
      expect(i18n.render("shop", "place", { place: 11 })).toBe("You finished 11th");
    });

    it("returns malformed templates unformatted", () => {
      expect(i18n.render("shop", "broken", { name: "Ann" })).toBe("Hello, {name");
    });
  });

  describe("hasLine", () => {
    it("reports resolution including fallback", () => {
      expect(i18n.hasLine("tests", "bye")).toBe(true);
      expect(i18n.hasLine("tests", "bye", "pt")).toBe(true);
      expect(i18n.hasLine("tests", "unknown")).toBe(false);
    });

    it("does not fall back when disabled", () => {
      i18n.setFallbackLevel(FallbackLevel.None);
      expect(i18n.hasLine("tests", "bye", "pt")).toBe(false);
    });
  });

  describe("lines", () => {
    it("lists loaded and injected lines", () => {
      expect(i18n.getLines()).toEqual({});
      i18n.render("tests", "hello");
      expect(i18n.getLines()).toEqual({
        en: { tests: { bye: "Bye!", hello: "Hello, {0}!" } },
      });

      i18n.addLines("pt", "tests", { bye: "Tchau!" });
      expect(i18n.getLines()).toEqual({
        en: { tests: { bye: "Bye!", hello: "Hello, {0}!" } },
        pt: { tests: { bye: "Tchau!" } },
      });

      i18n.addLines("en", "tests", { bye: "Good bye!" });
      expect(i18n.getLines()).toEqual({
        en: { tests: { bye: "Good bye!", hello: "Hello, {0}!" } },
        pt: { tests: { bye: "Tchau!" } },
      });
    });

    it("keeps injected lines over file lines added before the first scan", () => {
      i18n.addLines("en", "tests", { bye: "Later!" });
      expect(i18n.render("tests", "bye")).toBe("Later!");
      expect(i18n.render("tests", "hello", ["Ann"])).toBe("Hello, Ann!");
    });

    it("keeps injected lines over file lines added after a scan", () => {
      expect(i18n.render("tests", "bye")).toBe("Bye!");
      i18n.addLines("en", "tests", { bye: "Later!" });
      expect(i18n.render("tests", "bye")).toBe("Later!");
    });

    it("keeps injected lines across a reindex", () => {
      i18n.addLines("en", "tests", { bye: "Later!" });
      i18n.setDirectories([LOCALES_2, LOCALES_1]);
      expect(i18n.render("tests", "bye")).toBe("Later!");
      expect(i18n.render("tests", "hello", ["Ann"])).toBe("Hello, Ann!");
    });

    it("resets all lines", () => {
      i18n.addLines("en", "tests", { bye: "Later!" });
      i18n.resetLines();
      expect(i18n.getLines()).toEqual({});
      expect(i18n.render("tests", "bye")).toBe("Bye!");
    });

    it("returns one catalog without fallback", () => {
      i18n.setSupportedLocales(["pt"]);
      expect(i18n.getCatalog("tests", "pt")).toEqual({ hello: "Olá, {0}!" });
      expect(i18n.getCatalog("tests")).toEqual({ bye: "Bye!", hello: "Hello, {0}!" });
      expect(i18n.getCatalog("tests", "fr")).toEqual({});
    });
  });

  describe("directories", () => {
    it("normalizes, orders and deduplicates directories", () => {
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_1)]);

      i18n.setDirectories([LOCALES_2, LOCALES_1]);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_2), normalized(LOCALES_1)]);

      i18n.setDirectories([]);
      expect(i18n.getDirectories()).toEqual([]);

      i18n.addDirectory(LOCALES_1);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_1)]);
      i18n.addDirectory(LOCALES_1);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_1)]);

      i18n.addDirectory(LOCALES_2);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_2), normalized(LOCALES_1)]);

      i18n.setDirectories([LOCALES_1, `${LOCALES_1}${path.sep}`, LOCALES_2]);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_1), normalized(LOCALES_2)]);
    });

    it("rejects inaccessible directories without changing the list", () => {
      const err = catchError(() => i18n.setDirectories([LOCALES_2, path.join(fixtures, "unknown")]));
      expect(err).toBeInstanceOf(I18nError);
      expect(isI18nError(err, "config")).toBe(true);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_1)]);
    });

    it("rejects files given as directories", () => {
      const file = path.join(LOCALES_1, "en", "tests.json");
      expect(() => i18n.setDirectories([file])).toThrow(`Directory path inaccessible: ${file}`);
    });

    it("lets the first-listed directory win, retroactively", () => {
      expect(i18n.render("tests", "bye")).toBe("Bye!");
      i18n.setDirectories([LOCALES_2, LOCALES_1]);
      expect(i18n.render("tests", "bye")).toBe("Hasta la vista, baby.");
      i18n.setDirectories([LOCALES_1, LOCALES_2]);
      expect(i18n.render("tests", "bye")).toBe("Bye!");
    });

    it("gives a prepended directory precedence", () => {
      expect(i18n.render("tests", "bye")).toBe("Bye!");
      i18n.addDirectory(LOCALES_2);
      expect(i18n.render("tests", "bye")).toBe("Hasta la vista, baby.");
    });

    it("is idempotent when the same list is set twice", () => {
      i18n.render("tests", "bye");
      i18n.setDirectories([LOCALES_1, LOCALES_2]);
      const once = i18n.getLines();
      i18n.setDirectories([LOCALES_1, LOCALES_2]);
      expect(i18n.getLines()).toEqual(once);
    });

    it("propagates catalog read errors", () => {
      const broken = new I18nContext({ defaultLocale: "en", directories: [LOCALES_BROKEN] });
      const err = catchError(() => broken.render("tests", "bye"));
      expect(isI18nError(err, "io")).toBe(true);
    });

    it("restores the previous directories when a rescan fails", () => {
      expect(i18n.render("tests", "bye")).toBe("Bye!");
      const err = catchError(() => i18n.setDirectories([LOCALES_BROKEN]));
      expect(isI18nError(err, "io")).toBe(true);
      expect(i18n.getDirectories()).toEqual([normalized(LOCALES_1)]);
      expect(i18n.render("tests", "bye")).toBe("Bye!");
    });
  });

  describe("fallback levels", () => {
    beforeEach(() => {
      i18n.setDirectories([LOCALES_1, LOCALES_2]);
      i18n.setSupportedLocales(["pt", "pt-br"]);
    });

    it("defaults to the default level", () => {
      expect(i18n.getFallbackLevel()).toBe(FallbackLevel.Default);
    });

    it("prefers the parent locale over the default locale", () => {
      expect(i18n.render("tests", "hello", ["Mary"], "pt-br")).toBe("Olá, Mary!");
      expect(i18n.render("tests", "bye", [], "pt-br")).toBe("Tchau!");
      expect(i18n.render("tests", "bye", [], "pt")).toBe("Bye!");
    });

    it("stops at the parent locale with the parent level", () => {
      i18n.setFallbackLevel(FallbackLevel.Parent);
      expect(i18n.render("tests", "hello", ["Mary"], "pt-br")).toBe("Olá, Mary!");
      expect(i18n.render("tests", "bye", [], "pt")).toBe("tests.bye");
      expect(i18n.hasLine("tests", "bye", "pt")).toBe(false);
    });

    it("uses only the requested locale with the none level", () => {
      i18n.setFallbackLevel(FallbackLevel.None);
      expect(i18n.render("tests", "hello", ["Mary"], "pt-br")).toBe("tests.hello");
      expect(i18n.render("tests", "welcome", { name: "Ana" }, "pt-br")).toBe("Bem-vindo, Ana!");
    });

    it("accepts legacy integer levels", () => {
      i18n.setFallbackLevel(1);
      expect(i18n.getFallbackLevel()).toBe(FallbackLevel.Parent);
    });

    it("rejects invalid levels", () => {
      const err = catchError(() => i18n.setFallbackLevel(999));
      expect(isI18nError(err, "invalid_value")).toBe(true);
      expect(i18n.getFallbackLevel()).toBe(FallbackLevel.Default);
    });
  });

  describe("locales", () => {
    it("sorts, deduplicates and always keeps the default locale", () => {
      expect(i18n.getSupportedLocales()).toEqual(["en"]);
      i18n.setSupportedLocales(["pt-br", "pt-br", "en", "pt-br", "es", "en", "de", "pt"]);
      expect(i18n.getSupportedLocales()).toEqual(["de", "en", "es", "pt", "pt-br"]);
      i18n.setSupportedLocales(["jp"]);
      expect(i18n.getSupportedLocales()).toEqual(["en", "jp"]);
      i18n.setSupportedLocales([]);
      expect(i18n.getSupportedLocales()).toEqual(["en"]);
    });

    it("adds default and current locales to the supported ones", () => {
      i18n.setDefaultLocale("pt");
      expect(i18n.getSupportedLocales()).toEqual(["en", "pt"]);
      i18n.setSupportedLocales([]);
      expect(i18n.getSupportedLocales()).toEqual(["pt"]);

      i18n.setCurrentLocale("pt-br");
      expect(i18n.getSupportedLocales()).toEqual(["pt", "pt-br"]);
      i18n.setSupportedLocales([]);
      expect(i18n.getSupportedLocales()).toEqual(["pt"]);
      expect(i18n.getCurrentLocale()).toBe("pt-br");
      i18n.setCurrentLocale("pt-br");
      expect(i18n.getSupportedLocales()).toEqual(["pt", "pt-br"]);
    });

    it("keeps default and current locales independent", () => {
      i18n.setCurrentLocale("pt-br");
      expect(i18n.getDefaultLocale()).toBe("en");
      i18n.setDefaultLocale("es");
      expect(i18n.getCurrentLocale()).toBe("pt-br");
    });

    it("reports the direction of the current locale", () => {
      expect(i18n.getCurrentLocaleDirection()).toBe("ltr");
      i18n.setCurrentLocale("pt-br");
      expect(i18n.getCurrentLocaleDirection()).toBe("ltr");
      i18n.setCurrentLocale("uz_AF");
      expect(i18n.getCurrentLocale()).toBe("uz_AF");
      expect(i18n.getCurrentLocaleDirection()).toBe("rtl");
    });

    it("applies constructor options", () => {
      const context = new I18nContext({
        defaultLocale: "en",
        currentLocale: "pt-br",
        supportedLocales: ["pt"],
        directories: [LOCALES_1],
        fallbackLevel: FallbackLevel.Parent,
      });
      expect(context.getSupportedLocales()).toEqual(["en", "pt", "pt-br"]);
      expect(context.getFallbackLevel()).toBe(FallbackLevel.Parent);
      expect(context.render("tests", "hello", ["Mary"])).toBe("Olá, Mary!");
      expect(context.render("tests", "bye")).toBe("tests.bye");
    });
  });

  describe("formatting helpers", () => {
    const time = Date.UTC(2018, 7, 13, 8, 44, 31);

    beforeEach(() => {
      i18n = new I18nContext({ defaultLocale: "en", timeZone: "UTC" });
    });

    it("formats currency", () => {
      expect(i18n.currency(10.5, "USD")).toBe("$10.50");
      expect(i18n.currency(10.5, "BRL")).toBe("R$10.50");
      expect(i18n.currency(10.5, "BRL", "pt-br")).toBe("R$\u00a010,50");
    });

    it("formats dates", () => {
      expect(i18n.date(time)).toBe("8/13/18");
      expect(i18n.date(time, "short")).toBe("8/13/18");
      expect(i18n.date(time, "medium")).toBe("Aug 13, 2018");
      expect(i18n.date(time, "long")).toBe("August 13, 2018");
      expect(i18n.date(new Date(time), "full")).toBe("Monday, August 13, 2018");
      expect(i18n.date(time, "short", "pt-br")).toBe("13/08/2018");
      expect(i18n.date(time, "long", "pt-br")).toBe("13 de agosto de 2018");
    });

    it("formats dates in a given time zone", () => {
      const late = Date.UTC(2018, 7, 13, 23, 30);
      expect(i18n.date(late)).toBe("8/13/18");
      expect(i18n.date(late, "short", "en", "Asia/Tokyo")).toBe("8/14/18");
    });

    it("rejects unknown date styles", () => {
      expect(() => i18n.date(time, "unknown")).toThrow("Invalid date style format: unknown");
    });

    it("formats ordinals", () => {
      expect([1, 2, 3, 4, 11, 12, 13, 21].map((n) => i18n.ordinal(n))).toEqual([
        "1st",
        "2nd",
        "3rd",
        "4th",
        "11th",
        "12th",
        "13th",
        "21st",
      ]);
      expect(i18n.ordinal(1, "pt-br")).toBe("1º");
      expect(i18n.ordinal(3, "pt-br")).toBe("3º");
      expect(i18n.ordinal(7, "ja")).toBe("7");
    });
  });

  describe("observer", () => {
    it("records every render", () => {
      const collector = new RenderEventCollector();
      i18n.setObserver(collector);

      const before = Date.now();
      i18n.render("foo", "bar");
      i18n.render("tests", "hello", ["Mary"], "pt");
      const after = Date.now();

      const [miss, hit] = collector.getEvents();
      expect(miss).toMatchObject({
        namespace: "foo",
        key: "bar",
        requestedLocale: "en",
        locale: "en",
        text: "foo.bar",
        found: false,
      });
      expect(miss.start).toBeGreaterThanOrEqual(before);
      expect(miss.end).toBeGreaterThanOrEqual(miss.start);
      expect(hit.end).toBeLessThanOrEqual(after);
      expect(hit.duration).toBeGreaterThanOrEqual(0);
      expect(hit).toMatchObject({
        namespace: "tests",
        key: "hello",
        requestedLocale: "pt",
        locale: "en",
        text: "Hello, Mary!",
        found: true,
      });
    });

    it("does not affect resolution", () => {
      i18n.setObserver(undefined);
      expect(i18n.getObserver()).toBeUndefined();
      expect(i18n.render("tests", "bye")).toBe("Bye!");
    });
  });

  it("keeps contexts isolated", () => {
    const other = new I18nContext({ defaultLocale: "en", directories: [LOCALES_1] });
    i18n.addLines("en", "tests", { bye: "Later!" });
    expect(i18n.render("tests", "bye")).toBe("Later!");
    expect(other.render("tests", "bye")).toBe("Bye!");
  });
});
