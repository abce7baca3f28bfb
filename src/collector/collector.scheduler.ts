import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CollectionCycleService } from './collection-cycle.service';
import { errorMessage } from './error-message';

const DEFAULT_INTERVAL_SECONDS = 15;

/**
 * CollectorScheduler
 *
 * Runs a collection cycle, sleeps COLLECTION_INTERVAL_SECONDS, repeats. The
 * sleep starts when a cycle finishes, so a slow cycle pushes the next one
 * back instead of overlapping it. Cycle-level errors are logged and the
 * loop goes on; only application shutdown ends it.
 */
@Injectable()
export class CollectorScheduler
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(CollectorScheduler.name);
  private readonly intervalMs: number;
  private running = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly collectionCycle: CollectionCycleService,
    private readonly configService: ConfigService,
  ) {
    this.intervalMs =
      this.configService.get<number>(
        'COLLECTION_INTERVAL_SECONDS',
        DEFAULT_INTERVAL_SECONDS,
      ) * 1000;
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.running) {
      this.logger.log('Scheduler already running');
      return;
    }

    this.logger.log(
      `Starting scheduler (collecting every ${this.intervalMs / 1000}s)`,
    );
    this.running = true;
    this.loop = this.run();
  }

  /**
   * Stop the scheduler. A pending sleep is cut short; a cycle in flight is
   * awaited.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
    await this.loop;
    this.loop = null;
    this.logger.log('Scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a single cycle, logging instead of raising a cycle-level error.
   */
  async tick(): Promise<void> {
    this.logger.log(`Reporting data at: ${new Date().toISOString()}`);
    try {
      await this.collectionCycle.runCycle();
    } catch (error) {
      this.logger.error(`Collection cycle failed: ${errorMessage(error)}`);
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      await this.tick();
      if (!this.running) {
        break;
      }
      await this.sleep(this.intervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake?.();
      }, ms);
    });
  }
}
