import { logger } from '../observability/logger';
import { ConversationEngine } from './conversation-engine';

/**
 * AbandonmentSweeper — periodically marks idle conversations abandoned.
 *
 * Plain setInterval; a sweep that is still running when the next tick fires
 * is not overlapped.
 */
export class AbandonmentSweeper {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private log = logger.child({ component: 'abandonment-sweeper' });

  constructor(
    private readonly engine: ConversationEngine,
    private readonly inactiveAfterMs: number,
    private readonly intervalMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  start(): void {
    this.log.info(
      { inactiveAfterMinutes: this.inactiveAfterMs / 60_000, intervalMinutes: this.intervalMs / 60_000 },
      'Abandonment sweeper started',
    );

    this.intervalHandle = setInterval(() => {
      this.sweep().catch((err) => this.log.error({ err }, 'Abandonment sweep failed'));
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Abandonment sweeper stopped');
    }
  }

  /** Run one sweep now. Returns the number of conversations marked. */
  async sweep(): Promise<number> {
    if (this.running) {
      this.log.warn('Sweep already running, skipping');
      return 0;
    }

    this.running = true;
    try {
      return await this.engine.markAbandoned(this.clock() - this.inactiveAfterMs);
    } finally {
      this.running = false;
    }
  }
}
