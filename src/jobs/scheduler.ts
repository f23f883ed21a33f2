import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

/** Named interval tasks. A failing run is logged; the next tick runs regardless. */
export class Scheduler {
  private readonly timers = new Map<string, { timer: NodeJS.Timeout; everyMs: number }>();

  constructor(private readonly logger: Logger) {}

  /** Registering an existing name replaces that task. */
  add(name: string, everyMs: number, task: () => Promise<unknown>): void {
    this.remove(name);
    const timer = setInterval(() => {
      void task().catch((err: unknown) => {
        this.logger.error('scheduled task failed', { name, err: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
      });
    }, everyMs);
    this.timers.set(name, { timer, everyMs });
    this.logger.debug('scheduled task registered', { name, everyMs });
  }

  remove(name: string): boolean {
    const entry = this.timers.get(name);
    if (!entry) return false;
    clearInterval(entry.timer);
    this.timers.delete(name);
    return true;
  }

  get size(): number {
    return this.timers.size;
  }

  shutdown(): void {
    for (const [, entry] of this.timers) {
      clearInterval(entry.timer);
    }
    this.timers.clear();
    this.logger.debug('scheduler shutdown complete');
  }
}
