export type FilePath = string;

/** A declared step. Frozen once appended; the workflow owns its outputs. */
export interface StepContract {
  readonly index: number;
  readonly title?: string;
  readonly commands: readonly string[];
  readonly inputs: readonly FilePath[];
  readonly outputs: readonly FilePath[];
  readonly orderOnlyInputs: readonly FilePath[];
  readonly quiet: boolean;
}

export interface StepDeclaration {
  title?: string;
  outputs: FilePath | FilePath[];
  inputs?: FilePath | FilePath[];
  orderOnlyInputs?: FilePath | FilePath[];
  commands: string | string[];
  /** Treat every output of this step as secondary. */
  secondary?: boolean;
  /** Discard stdout of each command. */
  quiet?: boolean;
}

export interface WorkflowInit {
  /** Targets the aggregate root depends on. Defaults to every non-secondary output. */
  finalOutputs?: FilePath | FilePath[];
  /** Printed once, before any step. */
  title?: string;
}

export interface StepTarget {
  step: StepContract;
  /** Steps producing this step's inputs (regular and order-only). */
  upstream: number[];
  downstream: number[];
}

export interface DependencyGraph {
  targets: StepTarget[];
  producers: Map<FilePath, number>;
  root: FilePath[];
  secondary: Set<FilePath>;
}
