/**
 * JSON configuration for an i18n context.
 *
 * Example (locale-lines.json):
 *   {
 *     "defaultLocale": "en",
 *     "supportedLocales": ["pt", "pt-br"],
 *     "directories": ["./locales"],
 *     "fallbackLevel": "default"
 *   }
 *
 * Relative directories resolve against the config file's directory.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { I18nContext, type I18nContextOptions } from "./context.js";
import { I18nError } from "./errors.js";
import { parseFallbackLevel } from "./fallback-level.js";

export const I18nConfigSchema = z
  .object({
    defaultLocale: z.string().min(1),
    currentLocale: z.string().min(1).optional(),
    supportedLocales: z.array(z.string().min(1)).optional(),
    directories: z.array(z.string().min(1)).optional(),
    fallbackLevel: z.union([z.enum(["none", "parent", "default"]), z.number().int()]).optional(),
  })
  .strict();

export type I18nConfig = z.infer<typeof I18nConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a raw config value. Relative directories resolve against baseDir
 * when given.
 */
export function parseI18nConfig(raw: unknown, baseDir?: string): I18nConfig {
  const result = I18nConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new I18nError("config", `Invalid i18n config: ${formatIssues(result.error)}`);
  }
  const config = result.data;
  if (baseDir !== undefined && config.directories) {
    return {
      ...config,
      directories: config.directories.map((directory) => resolve(baseDir, directory)),
    };
  }
  return config;
}

export function loadI18nConfig(filePath: string): I18nConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new I18nError("config", `Failed to read i18n config ${filePath}`, { cause: err });
  }
  return parseI18nConfig(raw, dirname(resolve(filePath)));
}

/**
 * Build a context from a config. Options given in `extra` (loader, logger,
 * observer, ...) are passed through; locale settings come from the config.
 */
export function createContextFromConfig(
  config: I18nConfig,
  extra: Omit<I18nContextOptions, "defaultLocale"> = {},
): I18nContext {
  return new I18nContext({
    ...extra,
    defaultLocale: config.defaultLocale,
    currentLocale: config.currentLocale ?? extra.currentLocale,
    supportedLocales: config.supportedLocales ?? extra.supportedLocales,
    directories: config.directories ?? extra.directories,
    fallbackLevel:
      config.fallbackLevel !== undefined
        ? parseFallbackLevel(config.fallbackLevel)
        : extra.fallbackLevel,
  });
}
