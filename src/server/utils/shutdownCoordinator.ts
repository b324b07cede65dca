import { logger } from './logger.js';

export type ShutdownHandler = () => Promise<void> | void;

interface ShutdownStep {
  name: string;
  handler: ShutdownHandler;
  timeoutMs?: number;
}

export interface ShutdownResult {
  completed: string[];
  failed: string[];
}

/**
 * Runs registered shutdown steps in registration order.
 *
 * A failing or stalled step is logged and skipped so later steps (closing
 * the database after the HTTP server) still run. If the whole sequence
 * exceeds the overall budget, `onTimeout` fires.
 */
export class ShutdownCoordinator {
  private readonly steps: ShutdownStep[] = [];
  private shuttingDown = false;

  constructor(
    private readonly overallTimeoutMs: number = 30000,
    private readonly onTimeout: () => void = () => process.exit(1)
  ) {}

  register(name: string, handler: ShutdownHandler, timeoutMs?: number): void {
    this.steps.push({ name, handler, timeoutMs });
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Run every step once. A second call while shutting down is a no-op.
   */
  async shutdown(signal?: string): Promise<ShutdownResult> {
    const result: ShutdownResult = { completed: [], failed: [] };
    if (this.shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return result;
    }

    this.shuttingDown = true;
    logger.info({ signal, steps: this.steps.length }, 'Starting graceful shutdown');

    const overallTimer = setTimeout(() => {
      logger.error({ timeoutMs: this.overallTimeoutMs }, 'Graceful shutdown timed out');
      this.onTimeout();
    }, this.overallTimeoutMs);
    overallTimer.unref();

    try {
      for (const step of this.steps) {
        if (await this.runStep(step)) {
          result.completed.push(step.name);
        } else {
          result.failed.push(step.name);
        }
      }
    } finally {
      clearTimeout(overallTimer);
    }

    logger.info(result, 'Graceful shutdown finished');
    return result;
  }

  private async runStep({ name, handler, timeoutMs }: ShutdownStep): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const running = Promise.resolve().then(handler);
      if (timeoutMs === undefined) {
        await running;
      } else {
        await Promise.race([
          running,
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Shutdown step ${name} timed out after ${timeoutMs}ms`)), timeoutMs);
          }),
        ]);
      }
      logger.debug({ step: name }, 'Shutdown step completed');
      return true;
    } catch (error) {
      logger.error({ err: error, step: name }, 'Shutdown step failed, continuing');
      return false;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}
