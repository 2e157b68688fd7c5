export { eventEnvelopeSchema, parseEventMessage, serializeEvent } from './event-schema.js';
export type { EventEnvelope } from './event-schema.js';
export { EventBus } from './event-bus.js';
export type { EventBusOptions, EventPublisher } from './event-bus.js';
export { EventConsumer } from './event-consumer.js';
export type { EventHandler } from './event-consumer.js';
export {
  AgentTaskError,
  InvalidStepTransitionError,
  InvalidWorkflowTransitionError,
  StepCancelledError,
  StepTimeoutError,
  UnknownStepFunctionError,
  UnknownWorkflowTypeError,
  WorkflowError,
  errorMessage,
} from './errors.js';
export * from './agents/index.js';
export * from './workflows/index.js';
