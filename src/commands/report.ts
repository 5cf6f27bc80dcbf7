import type { I18nContext, RenderEventCollector } from "../i18n/index.js";
import { buildReport } from "../i18n/index.js";
import type { RuntimeEnv } from "../runtime.js";
import { defaultRuntime } from "../runtime.js";

export function reportCommand(
  context: I18nContext,
  collector?: RenderEventCollector,
  runtime: RuntimeEnv = defaultRuntime,
): void {
  runtime.log(buildReport(context, collector));
}
