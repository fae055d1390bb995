/**
 * Raised while a workflow is being declared, before anything runs.
 */
export class DeclarationError extends Error {
  constructor(public readonly reason: string, message?: string) {
    super(message ?? `Invalid workflow declaration: ${reason}`);
    this.name = 'DeclarationError';
  }
}

export class CyclicDependencyError extends Error {
  constructor(public readonly cycle: string[], message?: string) {
    super(message ?? `Cyclic dependency detected: ${cycle.join(' -> ')}`);
    this.name = 'CyclicDependencyError';
  }
}

/**
 * A command of a triggered step exited non-zero. Downstream steps were not attempted.
 */
export class WorkflowFailedError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly failed: string[],
    message?: string
  ) {
    super(message ?? `Workflow failed with status ${exitCode}${failed.length ? ` (${failed.join(', ')})` : ''}`);
    this.name = 'WorkflowFailedError';
  }
}

/**
 * The engine could not run at all: missing binary, malformed description,
 * or an input nobody produces. No user command ran.
 */
export class EngineInvocationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'EngineInvocationError';
  }
}
