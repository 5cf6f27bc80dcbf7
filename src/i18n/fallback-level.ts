import { I18nError } from "./errors.js";

/**
 * How far a lookup travels when the requested locale lacks a line.
 */
export const FallbackLevel = {
  /** Use lines only from the given locale. */
  None: 0,
  /**
   * Fallback to the parent locale: "pt-br" tries "pt".
   *
   * The parent locale must be one of the supported locales for this to work.
   */
  Parent: 1,
  /** If the parent locale has no line, try the default locale. */
  Default: 2,
} as const;

export type FallbackLevel = (typeof FallbackLevel)[keyof typeof FallbackLevel];

export type FallbackLevelName = "none" | "parent" | "default";

const LEVEL_NAMES: Record<FallbackLevel, FallbackLevelName> = {
  [FallbackLevel.None]: "none",
  [FallbackLevel.Parent]: "parent",
  [FallbackLevel.Default]: "default",
};

const LEVELS: readonly FallbackLevel[] = [
  FallbackLevel.None,
  FallbackLevel.Parent,
  FallbackLevel.Default,
];

function isFallbackLevel(value: number): value is FallbackLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Convert a legacy integer level (0, 1 or 2).
 */
export function fallbackLevelFromInt(value: number): FallbackLevel {
  if (!isFallbackLevel(value)) {
    throw new I18nError("invalid_value", `Invalid fallback level: ${value}`);
  }
  return value;
}

export function fallbackLevelName(level: FallbackLevel): FallbackLevelName {
  return LEVEL_NAMES[level];
}

/**
 * Parse a level given by name ("parent") or as an integer ("1", 1).
 */
export function parseFallbackLevel(token: string | number): FallbackLevel {
  if (typeof token === "number") {
    return fallbackLevelFromInt(token);
  }
  const normalized = token.trim().toLowerCase();
  const named = LEVELS.find((level) => LEVEL_NAMES[level] === normalized);
  if (named !== undefined) {
    return named;
  }
  if (/^\d+$/.test(normalized)) {
    return fallbackLevelFromInt(Number(normalized));
  }
  throw new I18nError("invalid_value", `Invalid fallback level: ${token}`);
}
