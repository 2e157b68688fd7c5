import type { WorkflowSnapshot } from '../../domain/index.js';

/**
 * Extension point for durable workflow state. The engine hands over a
 * snapshot after every transition it observes; implementations decide
 * what to persist. Nothing is read back yet: restoring in-flight
 * workflows after a restart needs replayable step handlers first.
 */
export interface CheckpointStore {
  save(snapshot: WorkflowSnapshot): Promise<void>;
}

export class NoopCheckpointStore implements CheckpointStore {
  async save(): Promise<void> {}
}
