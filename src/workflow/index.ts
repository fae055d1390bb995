import type { FilePath, StepContract, StepDeclaration, WorkflowInit } from "../types/contracts.js";
import { DeclarationError } from "../errors.js";
import { toCommandList, toPathList } from "./paths.js";
import { WorkflowDefinitionSchema } from "./schema.js";

/**
 * Ordered list of step declarations. Nothing runs while a workflow is being
 * built; see runWorkflow().
 */
export class Workflow {
  readonly title?: string;
  private readonly finalOutputs?: FilePath[];
  private readonly declared: StepContract[] = [];
  private readonly owners = new Map<FilePath, number>();
  private readonly secondary = new Set<FilePath>();
  private cleanup: string[] = [];
  private frozen = false;

  constructor(init: WorkflowInit = {}) {
    if (init.title !== undefined) {
      assertText(init.title, "title");
      this.title = init.title;
    }
    if (init.finalOutputs !== undefined) {
      const finals = toPathList(init.finalOutputs);
      if (finals.length === 0) throw new DeclarationError("finalOutputs must name at least one file");
      this.finalOutputs = finals;
    }
  }

  static fromDefinition(raw: unknown): Workflow {
    const parsed = WorkflowDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`);
      throw new DeclarationError(issues.join("; "));
    }
    const def = parsed.data;
    const wf = new Workflow({ title: def.title, finalOutputs: def.finalOutputs });
    for (const step of def.steps) wf.append(step);
    if (def.secondary !== undefined) wf.markSecondary(def.secondary);
    if (def.clean !== undefined) wf.clean(def.clean);
    return wf;
  }

  get steps(): readonly StepContract[] {
    return Object.freeze([...this.declared]);
  }

  get secondaryOutputs(): ReadonlySet<FilePath> {
    return this.secondary;
  }

  get cleanCommands(): readonly string[] {
    return this.cleanup;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  append(decl: StepDeclaration): StepContract {
    this.assertMutable();
    const outputs = toPathList(decl.outputs);
    if (outputs.length === 0) throw new DeclarationError("a step needs at least one output");
    const inputs = toPathList(decl.inputs);
    const orderOnlyInputs = toPathList(decl.orderOnlyInputs).filter(p => !inputs.includes(p));
    const commands = toCommandList(decl.commands);
    if (decl.title !== undefined) assertText(decl.title, "title");

    for (const out of outputs) {
      const owner = this.owners.get(out);
      if (owner !== undefined) {
        throw new DeclarationError(`output '${out}' is already produced by step ${owner + 1}`);
      }
      if (inputs.includes(out) || orderOnlyInputs.includes(out)) {
        throw new DeclarationError(`output '${out}' is also an input of the same step`);
      }
    }

    const step: StepContract = Object.freeze({
      index: this.declared.length,
      title: decl.title,
      commands: Object.freeze(commands),
      inputs: Object.freeze(inputs),
      outputs: Object.freeze(outputs),
      orderOnlyInputs: Object.freeze(orderOnlyInputs),
      quiet: decl.quiet ?? false,
    });
    this.declared.push(step);
    for (const out of outputs) this.owners.set(out, step.index);
    if (decl.secondary) for (const out of outputs) this.secondary.add(out);
    return step;
  }

  markSecondary(outputs: FilePath | readonly FilePath[]): void {
    this.assertMutable();
    for (const out of toPathList(outputs)) this.secondary.add(out);
  }

  clean(commands: string | readonly string[]): void {
    this.assertMutable();
    this.cleanup = toCommandList(commands);
  }

  /** Files the aggregate root target depends on. */
  rootTargets(): FilePath[] {
    if (this.finalOutputs) return [...this.finalOutputs];
    return this.declared.flatMap(s => s.outputs).filter(out => !this.secondary.has(out));
  }

  producerOf(file: FilePath): StepContract | undefined {
    const idx = this.owners.get(file);
    return idx === undefined ? undefined : this.declared[idx];
  }

  /** Called when a run starts; later declarations are rejected. */
  freeze(): void {
    this.frozen = true;
  }

  private assertMutable() {
    if (this.frozen) throw new DeclarationError("workflow can no longer be changed once it has run");
  }
}

export function stepLabel(step: StepContract): string {
  return step.outputs.join(" ");
}

function assertText(text: string, what: string) {
  if (text.includes("\0")) throw new DeclarationError(`${what} must not contain NUL bytes`);
}
