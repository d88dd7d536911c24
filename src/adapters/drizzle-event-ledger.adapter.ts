import { sql } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type {
  AppendOutcome,
  IEventLedgerAdapter,
  ListEventsOptions,
} from '../interfaces/event-ledger-adapter.interface';
import type { RunRecord } from '../interfaces/run.interface';
import type { TelemetryEvent } from '../interfaces/telemetry-event.interface';
import { DEFAULT_LEDGER_TABLE } from '../telemetry.constants';
import {
  hydrateEvent,
  hydrateRun,
  ledgerCountRowSchema,
  ledgerEventRowSchema,
  ledgerRunIdRowSchema,
  ledgerRunRowSchema,
  RUN_COLUMNS,
} from '../utils/hydrate-ledger-row';
import { runsTableName, validateTableName } from '../utils/validate-table-name';

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows(result: unknown): unknown[] {
  if (Array.isArray(result)) return result;
  if (
    result &&
    typeof result === 'object' &&
    'rows' in result &&
    Array.isArray(result.rows)
  ) {
    return result.rows;
  }
  return [];
}

export class DrizzleEventLedgerAdapter implements IEventLedgerAdapter {
  private readonly runsTable: string;

  constructor(
    private readonly db: PgDatabase<any, any, any>,
    private readonly tableName: string = DEFAULT_LEDGER_TABLE,
  ) {
    validateTableName(tableName);
    this.runsTable = runsTableName(tableName);
  }

  async appendEvent(event: TelemetryEvent): Promise<AppendOutcome> {
    const payloadJson = JSON.stringify(event);
    const inserted = await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.tableName)}
          (run_id, sequence, event_id, event_type, node_id, parent_node_id, occurred_at, payload)
          VALUES (${event.runId}, ${event.sequence}, ${event.eventId}, ${event.eventType}, ${event.nodeId}, ${event.parentNodeId}, ${event.timestamp}, ${payloadJson}::jsonb)
          ON CONFLICT DO NOTHING
          RETURNING event_id`,
    );
    if (extractRows(inserted).length > 0) return 'appended';

    const existing = await this.db.execute(
      sql`SELECT event_id FROM ${sql.raw(this.tableName)} WHERE run_id = ${event.runId} AND event_id = ${event.eventId} LIMIT 1`,
    );
    return extractRows(existing).length > 0 ? 'duplicate' : 'conflict';
  }

  async listEvents(
    runId: string,
    options: ListEventsOptions = {},
  ): Promise<TelemetryEvent[]> {
    const limitClause =
      options.limit === undefined ? sql`` : sql` LIMIT ${options.limit}`;
    const result = await this.db.execute(
      sql`SELECT run_id, sequence, event_id, payload FROM ${sql.raw(this.tableName)} WHERE run_id = ${runId} ORDER BY sequence ASC${limitClause} OFFSET ${options.offset ?? 0}`,
    );

    return extractRows(result).map((row) =>
      hydrateEvent(ledgerEventRowSchema.parse(row)),
    );
  }

  async countEvents(runId: string): Promise<number> {
    const result = await this.db.execute(
      sql`SELECT COUNT(*)::int AS count FROM ${sql.raw(this.tableName)} WHERE run_id = ${runId}`,
    );
    const [row] = extractRows(result);
    return row === undefined ? 0 : Number(ledgerCountRowSchema.parse(row).count);
  }

  async upsertRun(run: RunRecord): Promise<void> {
    const initialStateIds = JSON.stringify(run.initialStateIds);
    const violations = JSON.stringify(run.violations);
    const gapSequences = JSON.stringify(run.gapSequences);
    const rejectedSequences = JSON.stringify(run.rejectedSequences);

    await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.runsTable)}
          (run_id, workflow_id, workflow_name, status, started_at, ended_at, initial_state_ids, inconsistent, violations, next_sequence, gap_sequences, rejected_sequences, updated_at)
          VALUES (${run.runId}, ${run.workflowId}, ${run.workflowName}, ${run.status}, ${run.startedAt}, ${run.endedAt}, ${initialStateIds}::jsonb, ${run.inconsistent}, ${violations}::jsonb, ${run.nextSequence}, ${gapSequences}::jsonb, ${rejectedSequences}::jsonb, CURRENT_TIMESTAMP)
          ON CONFLICT (run_id) DO UPDATE SET
            workflow_id = EXCLUDED.workflow_id,
            workflow_name = EXCLUDED.workflow_name,
            status = EXCLUDED.status,
            started_at = EXCLUDED.started_at,
            ended_at = EXCLUDED.ended_at,
            initial_state_ids = EXCLUDED.initial_state_ids,
            inconsistent = EXCLUDED.inconsistent,
            violations = EXCLUDED.violations,
            next_sequence = EXCLUDED.next_sequence,
            gap_sequences = EXCLUDED.gap_sequences,
            rejected_sequences = EXCLUDED.rejected_sequences,
            updated_at = CURRENT_TIMESTAMP`,
    );
  }

  async findRun(runId: string): Promise<RunRecord | null> {
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(RUN_COLUMNS)} FROM ${sql.raw(this.runsTable)} WHERE run_id = ${runId}`,
    );

    const [row] = extractRows(result);
    if (row === undefined) return null;
    return hydrateRun(ledgerRunRowSchema.parse(row));
  }

  async listRunIds(workflowId?: string): Promise<string[]> {
    const result = await this.db.execute(
      workflowId === undefined
        ? sql`SELECT run_id FROM ${sql.raw(this.runsTable)} UNION SELECT DISTINCT run_id FROM ${sql.raw(this.tableName)} ORDER BY run_id ASC`
        : sql`SELECT run_id FROM ${sql.raw(this.runsTable)} WHERE workflow_id = ${workflowId} ORDER BY run_id ASC`,
    );
    return extractRows(result).map(
      (row) => ledgerRunIdRowSchema.parse(row).run_id,
    );
  }
}
