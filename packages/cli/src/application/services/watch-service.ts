/**
 * @file packages/cli/src/application/services/watch-service.ts
 * @description Runs a render cycle at a fixed interval until stopped.
 */

import { inject, injectable } from 'tsyringe';
import { Logger, type LoggerLike } from '../../logger.js';

export type WatchCycle = () => Promise<unknown>;

/**
 * Encapsulates the watch-mode polling loop.
 */
@injectable()
export class WatchService {
  private interval: NodeJS.Timeout | null = null;
  private isCycleRunning = false;
  private cycles = 0;

  constructor(@inject(Logger) private logger: LoggerLike) {}

  /**
   * Runs `cycle` now and then every `intervalSeconds`.
   * A tick arriving while the previous cycle is still busy is skipped.
   */
  start(intervalSeconds: number, cycle: WatchCycle): void {
    if (this.interval) return;

    const intervalMs = intervalSeconds * 1000;
    this.logger.debug(`[Watch] Starting (Interval: ${intervalMs}ms)`);

    void this.tick(cycle);
    this.interval = setInterval(() => {
      void this.tick(cycle);
    }, intervalMs);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.logger.debug(`[Watch] Stopped after ${this.cycles} cycles`);
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  private async tick(cycle: WatchCycle): Promise<void> {
    if (this.isCycleRunning) {
      this.logger.debug('[Watch] Previous cycle still running, skipping tick.');
      return;
    }
    this.isCycleRunning = true;
    try {
      await cycle();
      this.cycles++;
    } catch (err) {
      this.logger.error({ err }, '[Watch] Cycle failed');
    } finally {
      this.isCycleRunning = false;
    }
  }
}
