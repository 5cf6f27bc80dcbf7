import type { I18nContext } from "../i18n/index.js";
import { getMissingKeys } from "../i18n/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";

type CheckOptions = {
  verbose?: boolean;
};

/**
 * Report keys of the default locale missing from the other supported locales.
 *
 * @returns number of missing keys across all locales
 */
export function checkCommand(
  context: I18nContext,
  options: CheckOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
): number {
  const defaultLocale = context.getDefaultLocale();
  let total = 0;

  for (const locale of context.getSupportedLocales()) {
    if (locale === defaultLocale) continue;

    const missing = getMissingKeys(context, locale);
    total += missing.length;
    if (missing.length === 0) {
      runtime.log(`${locale}: complete`);
      continue;
    }
    runtime.log(`${locale}: ${missing.length} missing key(s)`);
    if (options.verbose) {
      for (const key of missing) {
        runtime.log(`  - ${key}`);
      }
    }
  }

  return total;
}
