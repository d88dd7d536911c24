export enum TelemetryEventType {
  RUN_STARTED = 'telemetry.run.started',
  RUN_STATUS_CHANGED = 'telemetry.run.status_changed',
  RUN_INCONSISTENT = 'telemetry.run.inconsistent',
  EVENT_REJECTED = 'telemetry.event.rejected',
  GAP_RELEASED = 'telemetry.gap.released',
}
