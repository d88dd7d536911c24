import type { Pool } from 'pg';
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
  RUN_COLUMNS,
  runRowValues,
  type LedgerCountRow,
  type LedgerEventRow,
  type LedgerRunIdRow,
  type LedgerRunRow,
} from '../utils/hydrate-ledger-row';
import { runsTableName, validateTableName } from '../utils/validate-table-name';

interface PgEventIdRow {
  event_id: string;
}

/** A Pool, or a checked-out PoolClient when the caller manages the transaction. */
export type PgQueryable = Pick<Pool, 'query'>;

export class PgEventLedgerAdapter implements IEventLedgerAdapter {
  private readonly runsTable: string;

  constructor(
    private readonly pool: PgQueryable,
    private readonly tableName: string = DEFAULT_LEDGER_TABLE,
  ) {
    validateTableName(tableName);
    this.runsTable = runsTableName(tableName);
  }

  async appendEvent(event: TelemetryEvent): Promise<AppendOutcome> {
    const inserted = await this.pool.query<PgEventIdRow>(
      `INSERT INTO ${this.tableName}
       (run_id, sequence, event_id, event_type, node_id, parent_node_id, occurred_at, payload)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
       ON CONFLICT DO NOTHING
       RETURNING event_id`,
      [
        event.runId,
        event.sequence,
        event.eventId,
        event.eventType,
        event.nodeId,
        event.parentNodeId,
        event.timestamp,
        JSON.stringify(event),
      ],
    );
    if (inserted.rows.length > 0) return 'appended';

    const existing = await this.pool.query<PgEventIdRow>(
      `SELECT event_id FROM ${this.tableName}
       WHERE run_id = $1 AND event_id = $2
       LIMIT 1`,
      [event.runId, event.eventId],
    );
    return existing.rows.length > 0 ? 'duplicate' : 'conflict';
  }

  async listEvents(
    runId: string,
    options: ListEventsOptions = {},
  ): Promise<TelemetryEvent[]> {
    const result = await this.pool.query<LedgerEventRow>(
      `SELECT run_id, sequence, event_id, payload
       FROM ${this.tableName}
       WHERE run_id = $1
       ORDER BY sequence ASC
       LIMIT $2 OFFSET $3`,
      [runId, options.limit ?? null, options.offset ?? 0],
    );

    return result.rows.map((row) => hydrateEvent(row));
  }

  async countEvents(runId: string): Promise<number> {
    const result = await this.pool.query<LedgerCountRow>(
      `SELECT COUNT(*)::int AS count FROM ${this.tableName} WHERE run_id = $1`,
      [runId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async upsertRun(run: RunRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.runsTable} (${RUN_COLUMNS}, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9::jsonb, $10, $11::jsonb, $12::jsonb, CURRENT_TIMESTAMP)
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
      runRowValues(run),
    );
  }

  async findRun(runId: string): Promise<RunRecord | null> {
    const result = await this.pool.query<LedgerRunRow>(
      `SELECT ${RUN_COLUMNS} FROM ${this.runsTable} WHERE run_id = $1`,
      [runId],
    );

    if (result.rows.length === 0) return null;
    return hydrateRun(result.rows[0]);
  }

  async listRunIds(workflowId?: string): Promise<string[]> {
    const result =
      workflowId === undefined
        ? await this.pool.query<LedgerRunIdRow>(
            `SELECT run_id FROM ${this.runsTable}
             UNION
             SELECT DISTINCT run_id FROM ${this.tableName}
             ORDER BY run_id ASC`,
          )
        : await this.pool.query<LedgerRunIdRow>(
            `SELECT run_id FROM ${this.runsTable}
             WHERE workflow_id = $1
             ORDER BY run_id ASC`,
            [workflowId],
          );
    return result.rows.map((row) => row.run_id);
  }
}
