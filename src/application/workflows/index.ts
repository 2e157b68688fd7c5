export { WorkflowStep } from './workflow-step.js';
export { Workflow } from './workflow.js';
export type { StepExecutionContext, StepExecutor, WorkflowOptions } from './workflow.js';
export { runWithDeadline, sleep } from './timing.js';
export { StepCorrelator } from './step-correlator.js';
export type { StepCorrelatorOptions } from './step-correlator.js';
export { ROLE_REQUEST_EVENTS, StepDispatcher } from './step-dispatcher.js';
export type { LocalStepFunction, LocalStepRegistry, StepDispatcherOptions } from './step-dispatcher.js';
export { createLocalSteps } from './local-steps.js';
export type { LocalStepsDeps } from './local-steps.js';
export { DEFAULT_WORKFLOW_DEFINITIONS, WorkflowType, buildCatalog, toTemplate } from './catalog.js';
export { NoopCheckpointStore } from './checkpoint-store.js';
export type { CheckpointStore } from './checkpoint-store.js';
export {
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_MAX_COMPLETED_WORKFLOWS,
  WorkflowEngine,
} from './workflow-engine.js';
export type { EngineStats, UserWorkflowSummary, WorkflowEngineOptions, WorkflowFilter } from './workflow-engine.js';
