export {
  EventType,
  EVENT_TYPES,
  EVENT_GROUPS,
  EVENT_CATALOG_VERSION,
  DEFAULT_CELL_ID,
  DEFAULT_EVENT_NAMESPACE,
  isEventType,
  createEvent,
  freezeEvent,
  topicFor,
  partitionKeyFor,
} from './event.js';
export type { Event, EventData, EventMetadata, EventGroup, NewEvent } from './event.js';
export {
  WorkflowStatus,
  WORKFLOW_STATUSES,
  TERMINAL_WORKFLOW_STATUSES,
  isTerminalStatus,
  StepStatus,
  AGENT_ROLES,
  STEP_DEFAULTS,
} from './workflow.js';
export type {
  AgentRole,
  StepHandler,
  StepData,
  StepSpec,
  WorkflowDefinition,
  WorkflowTemplate,
  StepSnapshot,
  WorkflowSnapshot,
} from './workflow.js';
export {
  ApplicationStatus,
  APPLICATION_STATUSES,
  isApplicationStatus,
  ExperienceLevel,
} from './job.js';
export type {
  JobPosting,
  JobApplication,
  NewJobApplication,
  JobApplicationPatch,
  ResumeVersion,
  NewResumeVersion,
  JobAnalysis,
} from './job.js';
