import type { EventRejection, RunStatus } from '../interfaces/run.interface';

export interface RunStartedEvent {
  runId: string;
  workflowId: string | null;
  timestamp: Date;
}

export interface RunStatusChangedEvent {
  runId: string;
  fromStatus: RunStatus;
  toStatus: RunStatus;
  timestamp: Date;
}

export interface RunInconsistentEvent {
  runId: string;
  violation: EventRejection;
  timestamp: Date;
}

export interface EventRejectedEvent {
  runId: string;
  rejection: EventRejection;
  timestamp: Date;
}

export interface GapReleasedEvent {
  runId: string;
  missingSequences: number[];
  releasedSequences: number[];
  timestamp: Date;
}
