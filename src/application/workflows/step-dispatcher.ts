import type { Logger } from 'pino';
import { EventType, createEvent } from '../../domain/index.js';
import type { AgentRole, Event, StepData } from '../../domain/index.js';
import type { EventPublisher } from '../event-bus.js';
import type { StepCorrelator } from './step-correlator.js';
import type { StepExecutionContext } from './workflow.js';
import type { WorkflowStep } from './workflow-step.js';

/** A step implemented in-process rather than by an agent. */
export type LocalStepFunction = (input: StepData, context: StepExecutionContext) => Promise<StepData>;

export type LocalStepRegistry = Readonly<Record<string, LocalStepFunction>>;

/** Request tag each agent role consumes. Adding a role fails to compile until it is mapped here. */
export const ROLE_REQUEST_EVENTS: Readonly<Record<AgentRole, EventType>> = {
  discovery: EventType.JOB_DISCOVERY_REQUESTED,
  analysis: EventType.JOB_ANALYSIS_REQUESTED,
  generation: EventType.RESUME_GENERATION_REQUESTED,
  optimization: EventType.RESUME_OPTIMIZATION_REQUESTED,
};

export interface StepDispatcherOptions {
  publisher: EventPublisher;
  correlator: StepCorrelator;
  functions: LocalStepRegistry;
  cellId: string;
  logger: Logger;
}

/**
 * Executes a step according to its handler: agent steps go out as
 * request events and wait on the correlator, function steps are
 * called directly.
 */
export class StepDispatcher {
  private readonly publisher: EventPublisher;
  private readonly correlator: StepCorrelator;
  private readonly functions: LocalStepRegistry;
  private readonly cellId: string;
  private readonly log: Logger;

  constructor(options: StepDispatcherOptions) {
    this.publisher = options.publisher;
    this.correlator = options.correlator;
    this.functions = options.functions;
    this.cellId = options.cellId;
    this.log = options.logger.child({ component: 'step-dispatcher' });
  }

  hasFunction(name: string): boolean {
    return Object.hasOwn(this.functions, name);
  }

  readonly execute = async (
    step: WorkflowStep,
    input: StepData,
    context: StepExecutionContext,
  ): Promise<StepData> => {
    const handler = step.handler;
    switch (handler.kind) {
      case 'agent':
        return this.requestFromAgent(handler.role, input, context);
      case 'function': {
        const fn = this.functions[handler.name];
        if (fn === undefined) {
          throw new Error(`Step function ${handler.name} is not registered`);
        }
        return fn(input, context);
      }
      default: {
        const unreachable: never = handler;
        throw new Error(`Unhandled step handler: ${JSON.stringify(unreachable)}`);
      }
    }
  };

  private async requestFromAgent(role: AgentRole, input: StepData, context: StepExecutionContext): Promise<StepData> {
    const request = createEvent({
      event_type: ROLE_REQUEST_EVENTS[role],
      user_id: context.user_id,
      cell_id: this.cellId,
      correlation_id: context.workflow_id,
      data: input,
      metadata: {
        workflow_id: context.workflow_id,
        step_id: context.step_id,
        component: 'workflow-engine',
      },
    });

    // Registered before publishing so a fast reply cannot slip past.
    const reply = this.correlator.expect(request.event_id, context.signal);
    try {
      const [, output] = await Promise.all([this.send(request, context), reply]);
      return output;
    } catch (err: unknown) {
      this.correlator.discard(request.event_id);
      throw err;
    }
  }

  private async send(request: Event, context: StepExecutionContext): Promise<void> {
    const published = await this.publisher.publish(request);
    if (!published) {
      throw new Error(`Failed to publish ${request.event_type} for step ${context.step_id}`);
    }
    this.log.debug(
      { workflow_id: context.workflow_id, step_id: context.step_id, event_id: request.event_id },
      'Step request published',
    );
  }
}
