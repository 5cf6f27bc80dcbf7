import { Logger, type ILogObj } from "tslog";

/**
 * Minimal logger surface used by the i18n modules.
 */
export type I18nLogger = {
  debug: (...args: unknown[]) => unknown;
  info: (...args: unknown[]) => unknown;
  warn: (...args: unknown[]) => unknown;
  error: (...args: unknown[]) => unknown;
};

const DEFAULT_MIN_LEVEL = 3; // info

function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.LOCALE_LINES_LOG_LEVEL;
  if (!raw) return DEFAULT_MIN_LEVEL;
  const level = Number.parseInt(raw, 10);
  return Number.isNaN(level) ? DEFAULT_MIN_LEVEL : level;
}

let rootLogger: Logger<ILogObj> | null = null;

export function getRootLogger(): Logger<ILogObj> {
  rootLogger ??= new Logger<ILogObj>({
    name: "locale-lines",
    type: "pretty",
    minLevel: resolveMinLevel(),
  });
  return rootLogger;
}

export function getChildLogger(bindings: { module: string }): I18nLogger {
  return getRootLogger().getSubLogger({ name: bindings.module });
}
