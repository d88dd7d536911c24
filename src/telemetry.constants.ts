export const TELEMETRY_MODULE_OPTIONS = 'TELEMETRY_MODULE_OPTIONS';
export const EVENT_LEDGER_ADAPTER = 'EVENT_LEDGER_ADAPTER';
export const TRACKED_WORKFLOW_METADATA = 'TRACKED_WORKFLOW_METADATA';

export const DEFAULT_GAP_TIMEOUT_MS = 2_000;
export const DEFAULT_FIRST_SEQUENCE = 1;
export const DEFAULT_MAX_PENDING_PLACEHOLDERS = 1;
export const DEFAULT_MAX_BATCH_SIZE = 100;
/** Every second. */
export const DEFAULT_GAP_SWEEP_CRON = '* * * * * *';

export const DEFAULT_RELIABILITY_MAX_SAMPLES = 1_000;
/** 30 days. */
export const DEFAULT_RELIABILITY_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000;

export const DEFAULT_HIGH_GAP_BELOW_RATIO = 0.1;
export const DEFAULT_MEDIUM_GAP_BELOW_RATIO = 0.5;

export const DEFAULT_ERROR_TYPE = 'other';

/** Events table; the run table is `${table}_runs`. */
export const DEFAULT_LEDGER_TABLE = 'telemetry_events';
