#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_LEDGER_TABLE } from '../telemetry.constants';
import { runsTableName, validateTableName } from '../utils/validate-table-name';

export function generateMigration(tableName: string = DEFAULT_LEDGER_TABLE): string {
  validateTableName(tableName);
  const runsTable = runsTableName(tableName);

  return `-- migrate:up
CREATE TABLE ${tableName} (
    run_id TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    event_id TEXT NOT NULL,
    event_type TEXT NOT NULL,
    node_id TEXT NOT NULL,
    parent_node_id TEXT,
    occurred_at BIGINT NOT NULL,
    payload JSONB NOT NULL,
    recorded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (run_id, sequence),
    UNIQUE (run_id, event_id)
);

CREATE INDEX idx_${tableName}_node_id
    ON ${tableName} (run_id, node_id);

CREATE TABLE ${runsTable} (
    run_id TEXT PRIMARY KEY,
    workflow_id TEXT,
    workflow_name TEXT,
    status TEXT NOT NULL,
    started_at BIGINT,
    ended_at BIGINT,
    initial_state_ids JSONB NOT NULL DEFAULT '[]'::jsonb,
    inconsistent BOOLEAN NOT NULL DEFAULT FALSE,
    violations JSONB NOT NULL DEFAULT '[]'::jsonb,
    next_sequence INTEGER,
    gap_sequences JSONB NOT NULL DEFAULT '[]'::jsonb,
    rejected_sequences JSONB NOT NULL DEFAULT '[]'::jsonb,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${runsTable}_workflow_id
    ON ${runsTable} (workflow_id);

CREATE INDEX idx_${runsTable}_status
    ON ${runsTable} (status);

-- migrate:down
DROP TABLE IF EXISTS ${runsTable};
DROP TABLE IF EXISTS ${tableName};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      'Usage: telemetry-ledger generate-migration [tableName]\n\n' +
        'Generates a dbmate-compatible SQL migration for the event ledger tables.\n\n' +
        'Arguments:\n' +
        `  tableName    Events table name, default "${DEFAULT_LEDGER_TABLE}" (alphanumeric and underscores only).\n` +
        '               The run table is named <tableName>_runs.\n\n' +
        'Example:\n' +
        '  npx telemetry-ledger generate-migration checkout_events',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const tableName = args[1] ?? DEFAULT_LEDGER_TABLE;
  const sql = generateMigration(tableName);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${tableName}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
