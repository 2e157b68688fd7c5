/**
 * Workflow and step vocabulary shared by the engine, the agents and
 * the HTTP projections.
 */

export const WorkflowStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  PAUSED: 'paused',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type WorkflowStatus = (typeof WorkflowStatus)[keyof typeof WorkflowStatus];

export const WORKFLOW_STATUSES: readonly WorkflowStatus[] = Object.values(WorkflowStatus);

export const TERMINAL_WORKFLOW_STATUSES: readonly WorkflowStatus[] = [
  WorkflowStatus.COMPLETED,
  WorkflowStatus.FAILED,
  WorkflowStatus.CANCELLED,
];

export function isTerminalStatus(status: WorkflowStatus): boolean {
  return TERMINAL_WORKFLOW_STATUSES.includes(status);
}

export const StepStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
  RETRYING: 'retrying',
} as const;

export type StepStatus = (typeof StepStatus)[keyof typeof StepStatus];

/** Roles an agent-handled step can be addressed to. */
export const AGENT_ROLES = ['discovery', 'analysis', 'generation', 'optimization'] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

/**
 * What executes a step: a role-addressed agent reached over the bus,
 * or a function registered with the engine under `name`.
 */
export type StepHandler =
  | { readonly kind: 'agent'; readonly role: AgentRole }
  | { readonly kind: 'function'; readonly name: string };

export type StepData = Record<string, unknown>;

/** Declarative step row; see the workflow catalog. */
export interface StepSpec {
  readonly step_id: string;
  readonly name: string;
  readonly handler: StepHandler;
  readonly input_data?: StepData;
  readonly timeout_seconds?: number;
  readonly retry_count?: number;
  readonly retry_delay_seconds?: number;
  readonly required?: boolean;
}

export const STEP_DEFAULTS = {
  timeout_seconds: 300,
  retry_count: 3,
  retry_delay_seconds: 5,
  required: true,
} as const;

export interface WorkflowDefinition {
  readonly workflow_type: string;
  /** Public template id, e.g. `new_job_search`. */
  readonly template_id: string;
  readonly name: string;
  readonly description: string;
  readonly estimated_duration: string;
  readonly steps: readonly StepSpec[];
}

export interface WorkflowTemplate {
  template_id: string;
  workflow_type: string;
  name: string;
  description: string;
  estimated_duration: string;
  steps: number;
}

export interface StepSnapshot {
  step_id: string;
  name: string;
  handler: StepHandler;
  status: StepStatus;
  input_data: StepData;
  output_data: StepData | null;
  error_message: string | null;
  started_at: string | null;
  completed_at: string | null;
  duration_seconds: number | null;
  timeout_seconds: number;
  current_retry: number;
  max_retries: number;
  retry_delay_seconds: number;
  required: boolean;
}

export interface WorkflowSnapshot {
  workflow_id: string;
  workflow_type: string;
  user_id: number;
  status: WorkflowStatus;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  duration_seconds: number | null;
  current_step_index: number;
  total_steps: number;
  progress_percentage: number;
  context: StepData;
  error_message: string | null;
  steps: StepSnapshot[];
}
