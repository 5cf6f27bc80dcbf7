import { Command } from "commander";
import { checkCommand } from "../../commands/check.js";
import { renderCommand } from "../../commands/render.js";
import { reportCommand } from "../../commands/report.js";
import { RenderEventCollector } from "../../i18n/index.js";
import type { RuntimeEnv } from "../../runtime.js";
import { defaultRuntime } from "../../runtime.js";
import { createCliContext, type GlobalOptions } from "./context.js";

export const PROGRAM_VERSION = "0.1.0";

function collectDir(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime) {
  const program = new Command();

  program
    .name("locale-lines")
    .description("Look up and inspect message catalogs")
    .version(PROGRAM_VERSION)
    .option("-c, --config <path>", "JSON config file")
    .option("-d, --dir <path>", "catalog directory (repeatable, first wins)", collectDir)
    .option("-l, --locale <code>", "current locale")
    .option("--default-locale <code>", "default locale")
    .option("-s, --supported <codes>", "comma-separated supported locales")
    .option("--fallback <level>", "fallback level: none, parent or default")
    .configureOutput({
      writeOut: (str) => runtime.log(str.trimEnd()),
      writeErr: (str) => runtime.error(str.trimEnd()),
    });

  program
    .command("render")
    .description("Render a namespace.key line")
    .argument("<line>", "line in namespace.key form")
    .argument("[args...]", "positional arguments")
    .option("--json <object>", "named arguments as a JSON object")
    .option("--in <locale>", "render in this locale without changing the current one")
    .action(
      (line: string, args: string[], options: { json?: string; in?: string }, command: Command) => {
        const globals = command.optsWithGlobals<GlobalOptions>();
        renderCommand(
          createCliContext(globals),
          line,
          args,
          { json: options.json, locale: options.in },
          runtime,
        );
      },
    );

  program
    .command("report")
    .description("Print configuration and the lines reachable from the current locale")
    .option("--render <line...>", "render lines first and include them in the report")
    .action((options: { render?: string[] }, command: Command) => {
      const collector = new RenderEventCollector();
      const context = createCliContext(command.optsWithGlobals<GlobalOptions>(), {
        observer: collector,
      });
      for (const line of options.render ?? []) {
        context.renderDotted(line);
      }
      reportCommand(context, collector, runtime);
    });

  program
    .command("check")
    .description("List keys of the default locale missing from other supported locales")
    .option("--verbose", "list every missing key")
    .action((options: { verbose?: boolean }, command: Command) => {
      const context = createCliContext(command.optsWithGlobals<GlobalOptions>());
      const missing = checkCommand(context, options, runtime);
      if (missing > 0) {
        runtime.exit(1);
      }
    });

  return program;
}
