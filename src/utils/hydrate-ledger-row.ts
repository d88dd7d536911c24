import { z } from 'zod';
import { InvalidLedgerRowError } from '../errors/invalid-ledger-row.error';
import type { EventRejection, RunRecord } from '../interfaces/run.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';
import { telemetryEventSchema } from './telemetry-event.schema';

const epochColumn = z.union([z.number(), z.string()]);

export const ledgerEventRowSchema = z.object({
  run_id: z.string(),
  sequence: epochColumn,
  event_id: z.string(),
  payload: z.unknown(),
});

export const ledgerRunRowSchema = z.object({
  run_id: z.string(),
  workflow_id: z.string().nullable(),
  workflow_name: z.string().nullable(),
  status: z.string(),
  started_at: epochColumn.nullable(),
  ended_at: epochColumn.nullable(),
  initial_state_ids: z.unknown(),
  inconsistent: z.boolean(),
  violations: z.unknown(),
  next_sequence: epochColumn.nullable(),
  gap_sequences: z.unknown(),
  rejected_sequences: z.unknown(),
});

export const ledgerRunIdRowSchema = z.object({
  run_id: z.string(),
});

export const ledgerCountRowSchema = z.object({
  count: epochColumn,
});

export type LedgerEventRow = z.infer<typeof ledgerEventRowSchema>;
export type LedgerRunRow = z.infer<typeof ledgerRunRowSchema>;
export type LedgerCountRow = z.infer<typeof ledgerCountRowSchema>;
export type LedgerRunIdRow = z.infer<typeof ledgerRunIdRowSchema>;

const runStatusSchema = z.enum([
  'pending',
  'running',
  'completed',
  'failed',
  'timeout',
  'cancelled',
  'paused',
]);

const rejectionSchema: z.ZodType<EventRejection, z.ZodTypeDef, unknown> =
  z.object({
    eventId: z.string(),
    sequence: z.number().int().nullable(),
    nodeId: z.string().nullable(),
    reason: z.enum([
      'invalid_event',
      'run_mismatch',
      'sequence_conflict',
      'terminal_status_overwrite',
      'duplicate_start',
      'orphaned_parent',
      'parent_mismatch',
      'cycle_detected',
      'duplicate_root',
      'run_terminated',
    ]),
    detail: z.string(),
  });

const sequenceListSchema = z.array(z.number().int());

/** JSON columns come back parsed from pg, or as text from some drivers. */
function readJson(runId: string, column: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new InvalidLedgerRowError(
      runId,
      `Column ${column} of run ${runId} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/** BIGINT columns come back as strings from node-postgres. */
function readEpoch(value: number | string | null): number | null {
  if (value === null) return null;
  return typeof value === 'number' ? value : Number(value);
}

export function hydrateEvent(row: LedgerEventRow): TelemetryEvent {
  const result = telemetryEventSchema.safeParse(
    readJson(row.run_id, 'payload', row.payload),
  );
  if (!result.success) {
    throw new InvalidLedgerRowError(
      row.run_id,
      `Stored event ${row.event_id} of run ${row.run_id} is not a valid telemetry event: ${result.error.message}`,
    );
  }
  return result.data;
}

export function hydrateRun(row: LedgerRunRow): RunRecord {
  const status = runStatusSchema.safeParse(row.status);
  if (!status.success) {
    throw new InvalidLedgerRowError(
      row.run_id,
      `Run ${row.run_id} has invalid status ${row.status}`,
    );
  }

  const initialStateIds = z
    .array(z.string())
    .safeParse(readJson(row.run_id, 'initial_state_ids', row.initial_state_ids) ?? []);
  const violations = z
    .array(rejectionSchema)
    .safeParse(readJson(row.run_id, 'violations', row.violations) ?? []);
  const gapSequences = sequenceListSchema.safeParse(
    readJson(row.run_id, 'gap_sequences', row.gap_sequences) ?? [],
  );
  const rejectedSequences = sequenceListSchema.safeParse(
    readJson(row.run_id, 'rejected_sequences', row.rejected_sequences) ?? [],
  );
  if (
    !initialStateIds.success ||
    !violations.success ||
    !gapSequences.success ||
    !rejectedSequences.success
  ) {
    throw new InvalidLedgerRowError(
      row.run_id,
      `Run ${row.run_id} has malformed JSON columns`,
    );
  }

  return {
    runId: row.run_id,
    workflowId: row.workflow_id,
    workflowName: row.workflow_name,
    status: status.data,
    startedAt: readEpoch(row.started_at),
    endedAt: readEpoch(row.ended_at),
    initialStateIds: initialStateIds.data,
    inconsistent: row.inconsistent,
    violations: violations.data,
    nextSequence: readEpoch(row.next_sequence),
    gapSequences: gapSequences.data,
    rejectedSequences: rejectedSequences.data,
  };
}

/** Positional parameters for the run upsert, matching RUN_COLUMNS. */
export function runRowValues(run: RunRecord): unknown[] {
  return [
    run.runId,
    run.workflowId,
    run.workflowName,
    run.status,
    run.startedAt,
    run.endedAt,
    JSON.stringify(run.initialStateIds),
    run.inconsistent,
    JSON.stringify(run.violations),
    run.nextSequence,
    JSON.stringify(run.gapSequences),
    JSON.stringify(run.rejectedSequences),
  ];
}

export const RUN_COLUMNS =
  'run_id, workflow_id, workflow_name, status, started_at, ended_at, initial_state_ids, inconsistent, violations, next_sequence, gap_sequences, rejected_sequences';
