import { EventType, createEvent } from '../../domain/index.js';
import type { Event, EventData } from '../../domain/index.js';
import { errorMessage } from '../errors.js';

/** Metadata that marks an event as a workflow step request. */
export interface StepRequestRef {
  workflow_id: string;
  step_id: string;
}

export function readStepRequest(event: Event): StepRequestRef | null {
  const workflowId = event.metadata['workflow_id'];
  const stepId = event.metadata['step_id'];
  if (typeof workflowId !== 'string' || typeof stepId !== 'string') return null;
  return { workflow_id: workflowId, step_id: stepId };
}

/** Success reply the step correlator waits for. */
export function buildTaskCompletedEvent(
  request: Event,
  ref: StepRequestRef,
  agentId: string,
  output: EventData,
): Event {
  return createEvent({
    event_type: EventType.AGENT_TASK_COMPLETED,
    user_id: request.user_id,
    cell_id: request.cell_id,
    correlation_id: request.correlation_id ?? request.event_id,
    data: {
      request_event_id: request.event_id,
      workflow_id: ref.workflow_id,
      step_id: ref.step_id,
      agent_id: agentId,
      output,
    },
    metadata: { component: 'agent' },
  });
}

/**
 * Diagnostic event for a failed inbound event. Doubles as the failure
 * reply for step requests: the correlator matches `original_event_id`.
 */
export function buildAgentErrorEvent(source: Event, agentId: string, err: unknown): Event {
  const ref = readStepRequest(source);
  return createEvent({
    event_type: EventType.AGENT_HEALTH_CHECK,
    user_id: source.user_id,
    cell_id: source.cell_id,
    correlation_id: source.event_id,
    data: {
      agent_id: agentId,
      error: errorMessage(err),
      original_event_id: source.event_id,
      original_event_type: source.event_type,
      ...(ref === null ? {} : { workflow_id: ref.workflow_id, step_id: ref.step_id }),
    },
    metadata: { severity: 'error', component: 'agent' },
  });
}
