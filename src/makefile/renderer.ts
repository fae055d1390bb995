import type { StepContract } from "../types/contracts.js";
import type { Workflow } from "../workflow/index.js";
import { compileGraph } from "../orchestrator/compiler.js";
import { commandLine, echoLine, escapePrereq, escapeTarget, printLine } from "./escape.js";

export interface RenderOptions {
  /** `a b &: deps` rules (GNU make 4.3+). Older make gets one chained rule per extra output. */
  groupedTargets?: boolean;
  /** Make every step depend on the description file, so editing the workflow rebuilds. */
  trackDescription?: boolean;
}

export const ROOT_TARGET = "MAIN";
export const TITLE_TARGET = "pre-build";
export const LIST_TARGET = "list";
export const LIST_HEADING = "** Missing outputs **";

export function renderMakefile(workflow: Workflow, opts: RenderOptions = {}): string {
  compileGraph(workflow);
  const grouped = opts.groupedTargets ?? true;
  const hasTitle = workflow.title !== undefined;
  const hasClean = workflow.cleanCommands.length > 0;

  const phony = [ROOT_TARGET, ...(hasTitle ? [TITLE_TARGET] : []), LIST_TARGET, ...(hasClean ? ["clean"] : [])];
  const blocks: string[][] = [];

  blocks.push([`.PHONY: ${phony.join(" ")}`]);
  blocks.push([
    "DESCRIPTION := $(lastword $(MAKEFILE_LIST))",
    "CMDCOL := \x1b[32m",
    "DEFCOL := \x1b[0m",
  ]);
  blocks.push([rule(ROOT_TARGET, [...(hasTitle ? [TITLE_TARGET] : []), ...workflow.rootTargets().map(escapePrereq)])]);

  if (workflow.title !== undefined) {
    blocks.push([`${TITLE_TARGET}:`, `\t${printLine(workflow.title)}`]);
  }

  blocks.push([
    `${LIST_TARGET}:`,
    `\t${printLine(LIST_HEADING)}`,
    `\t@$(MAKE) -n --debug -f $(DESCRIPTION) ${ROOT_TARGET} | sed -n -e 's/^ *Must remake target //p' | sed -e '/^.${ROOT_TARGET}.\\.$$/d' -e '/^.${TITLE_TARGET}.\\.$$/d'`,
  ]);

  for (const step of workflow.steps) {
    blocks.push(...stepRules(step, { grouped, hasTitle, trackDescription: opts.trackDescription ?? false }));
  }

  if (workflow.secondaryOutputs.size > 0) {
    blocks.push([`.SECONDARY: ${[...workflow.secondaryOutputs].map(escapePrereq).join(" ")}`]);
  }

  if (hasClean) {
    blocks.push(["clean:", ...recipe(workflow.cleanCommands, false)]);
  }

  return blocks.map(lines => lines.join("\n")).join("\n\n") + "\n";
}

function stepRules(
  step: StepContract,
  ctx: { grouped: boolean; hasTitle: boolean; trackDescription: boolean }
): string[][] {
  const deps = step.inputs.map(escapePrereq);
  if (ctx.trackDescription) deps.push("$(DESCRIPTION)");
  const orderOnly = step.orderOnlyInputs.map(escapePrereq);
  if (ctx.hasTitle) orderOnly.push(TITLE_TARGET);

  const prereqs = orderOnly.length ? [...deps, "|", ...orderOnly] : deps;
  const body: string[] = [];
  if (step.title !== undefined) body.push(`\t${printLine(step.title)}`);
  body.push(...recipe(step.commands, step.quiet));

  const outs = step.outputs.map(escapeTarget);
  if (ctx.grouped) {
    return [[rule(outs.join(" "), prereqs, "&:"), ...body]];
  }

  const rules = [[rule(outs[0], prereqs), ...body]];
  for (let k = 1; k < outs.length; k++) {
    rules.push([
      rule(outs[k], [escapePrereq(step.outputs[k - 1])]),
      `\t@if test -f "$@"; then touch -h "$@"; else if [ -f "$<" ]; then rm -f "$<" && $(MAKE) --no-print-directory -f $(DESCRIPTION) "$<"; fi; fi`,
    ]);
  }
  return rules;
}

function recipe(commands: readonly string[], quiet: boolean): string[] {
  return commands.flatMap(cmd => [`\t${echoLine(cmd)}`, `\t${commandLine(cmd, quiet)}`]);
}

function rule(target: string, prereqs: string[], sep = ":"): string {
  return prereqs.length ? `${target} ${sep} ${prereqs.join(" ")}` : `${target} ${sep}`;
}
