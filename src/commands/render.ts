import { z } from "zod";
import type { I18nContext, MessageArgs } from "../i18n/index.js";
import { I18nError } from "../i18n/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";

type RenderOptions = {
  json?: string;
  locale?: string;
};

const NamedArgsSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]));

const NUMERIC_ARG = /^-?\d+(\.\d+)?$/;

/**
 * Positional CLI arguments are strings; numeric ones become numbers so that
 * plural and number placeholders work.
 */
export function parsePositionalArgs(args: readonly string[]): Array<string | number> {
  return args.map((arg) => (NUMERIC_ARG.test(arg) ? Number(arg) : arg));
}

export function parseNamedArgs(json: string): Record<string, string | number | boolean | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new I18nError("invalid_value", "--json must be a JSON object", { cause: err });
  }
  const result = NamedArgsSchema.safeParse(raw);
  if (!result.success) {
    throw new I18nError("invalid_value", "--json must map names to strings, numbers or booleans");
  }
  return result.data;
}

export function renderCommand(
  context: I18nContext,
  line: string,
  args: readonly string[],
  options: RenderOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
): string {
  const messageArgs: MessageArgs =
    options.json !== undefined ? parseNamedArgs(options.json) : parsePositionalArgs(args);
  const text = context.renderDotted(line, messageArgs, options.locale);
  runtime.log(text);
  return text;
}
