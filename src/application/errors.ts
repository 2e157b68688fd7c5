/**
 * Error classes raised by the workflow engine and the step machinery.
 * Only engine-level invalid transitions reach the caller; the rest are
 * turned into step failures and end up in `error_message`.
 */
export class WorkflowError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownWorkflowTypeError extends WorkflowError {
  constructor(readonly workflowType: string) {
    super(`Unknown workflow type: ${workflowType}`);
  }
}

export class InvalidWorkflowTransitionError extends WorkflowError {
  constructor(
    readonly workflowId: string,
    readonly from: string,
    readonly action: string,
  ) {
    super(`Cannot ${action} workflow ${workflowId} in status ${from}`);
  }
}

export class InvalidStepTransitionError extends WorkflowError {
  constructor(
    readonly stepId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Step ${stepId} cannot move from ${from} to ${to}`);
  }
}

export class UnknownStepFunctionError extends WorkflowError {
  constructor(readonly functionName: string, workflowType: string) {
    super(`Workflow ${workflowType} uses unregistered step function: ${functionName}`);
  }
}

export class StepTimeoutError extends WorkflowError {
  constructor(readonly stepId: string, readonly timeoutMs: number) {
    super(`Step ${stepId} timed out after ${timeoutMs / 1000}s`);
  }
}

export class StepCancelledError extends WorkflowError {
  constructor(readonly stepId: string) {
    super(`Step ${stepId} cancelled`);
  }
}

/** An agent reported failure for a step request. */
export class AgentTaskError extends WorkflowError {
  constructor(readonly agentId: string, detail: string) {
    super(`Agent ${agentId} failed: ${detail}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
