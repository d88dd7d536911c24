import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { CronJob } from 'cron';
import type { GapReleaseFailure } from '../interfaces/ingest-result.interface';
import { TELEMETRY_MODULE_OPTIONS } from '../telemetry.constants';
import { EventIngestionService } from './event-ingestion.service';

export interface GapSweepOptions {
  gapSweepCronExpression: string;
  enableGapSweep: boolean;
}

export interface GapSweepResult {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  runsScanned: number;
  runsReleased: number;
  eventsReleased: number;
  rejected: number;
  failed: number;
  failures: GapReleaseFailure[];
}

@Injectable()
export class GapSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(GapSweepService.name);
  private job: CronJob | null = null;

  constructor(
    private readonly ingestion: EventIngestionService,
    @Inject(TELEMETRY_MODULE_OPTIONS)
    private readonly options: GapSweepOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableGapSweep) {
      this.logger.log('Gap sweep disabled by configuration');
      return;
    }

    const job = new CronJob(this.options.gapSweepCronExpression, () => {
      this.sweep()
        .then((summary) => {
          if (summary.runsReleased === 0 && summary.failed === 0) return;
          this.logger.log(
            `Gap sweep summary: scanned=${summary.runsScanned}, released=${summary.runsReleased}, events=${summary.eventsReleased}, rejected=${summary.rejected}, failed=${summary.failed}, durationMs=${summary.durationMs}`,
          );
        })
        .catch((err) => {
          this.logger.error('Unhandled error in gap sweep', err);
        });
    });

    job.start();
    this.job = job;
    this.logger.log(
      `Gap sweep registered with expression: ${this.options.gapSweepCronExpression}`,
    );
  }

  onModuleDestroy(): void {
    this.job?.stop();
    this.job = null;
  }

  get isScheduled(): boolean {
    return this.job !== null;
  }

  async sweep(now: number = Date.now()): Promise<GapSweepResult> {
    const startedAt = new Date();
    const released = await this.ingestion.releaseExpiredGaps(now);
    const finishedAt = new Date();

    return {
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      runsScanned: released.runsScanned,
      runsReleased: released.runsReleased,
      eventsReleased: released.eventsReleased,
      rejected: released.rejected,
      failed: released.failures.length,
      failures: released.failures,
    };
  }
}
