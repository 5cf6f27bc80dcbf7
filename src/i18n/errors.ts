export type I18nErrorKind = "config" | "invalid_value" | "io";

/**
 * Error raised by the i18n context.
 *
 * - config: a configuration value was rejected (directory, config file)
 * - invalid_value: an argument is outside its accepted range
 * - io: a catalog could not be read or parsed
 */
export class I18nError extends Error {
  readonly kind: I18nErrorKind;

  constructor(kind: I18nErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "I18nError";
    this.kind = kind;
  }
}

export function isI18nError(err: unknown, kind?: I18nErrorKind): err is I18nError {
  return err instanceof I18nError && (kind === undefined || err.kind === kind);
}
