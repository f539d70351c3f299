import type {
  ApplicationCommandBus,
  ApplicationError,
  ApplicationEventBus,
} from '../../application';
import { MAZE_TICK_INTERVAL_MS } from '../../config/maze-defaults';
import { MODULE_IDS } from '../../shared/module-ids';

export interface TickSchedulerModuleOptions {
  readonly intervalMs?: number;
  readonly now?: () => number;
}

export interface TickSchedulerSummary {
  readonly ticks: number;
  readonly startedAt: number;
  readonly finishedAt: number;
}

export interface TickSchedulerModule {
  readonly moduleName: typeof MODULE_IDS.tickScheduler;
  start: () => Promise<TickSchedulerSummary>;
  stop: () => void;
  isRunning: () => boolean;
}

export class TickSchedulerError extends Error {
  readonly code: string;
  readonly retryable: boolean;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(error: ApplicationError) {
    super(`[${MODULE_IDS.tickScheduler}] ${error.message}`);
    this.name = 'TickSchedulerError';
    this.code = error.code;
    this.retryable = error.retryable;
    this.context = error.context;
  }
}

export function createTickSchedulerModule(
  commandBus: ApplicationCommandBus,
  eventBus: ApplicationEventBus,
  options: TickSchedulerModuleOptions = {},
): TickSchedulerModule {
  const intervalMs = Math.max(0, options.intervalMs ?? MAZE_TICK_INTERVAL_MS);
  const now = options.now ?? Date.now;
  let timer: ReturnType<typeof setInterval> | null = null;
  let unsubscribe: (() => void) | null = null;
  let cancelRun: (() => void) | null = null;

  const release = (): void => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }

    if (unsubscribe) {
      unsubscribe();
      unsubscribe = null;
    }

    cancelRun = null;
  };

  return {
    moduleName: MODULE_IDS.tickScheduler,
    start: () => {
      if (timer !== null) {
        return Promise.reject(
          new TickSchedulerError({
            code: 'scheduler.already-running',
            message: 'Tick scheduler is already running.',
            retryable: false,
            context: {},
          }),
        );
      }

      return new Promise<TickSchedulerSummary>((resolve, reject) => {
        const startedAt = now();
        let ticks = 0;
        let completed = false;

        unsubscribe = eventBus.subscribe((event) => {
          if (event.eventType === 'application/tick' && event.payload.phase === 'complete') {
            completed = true;
          }
        });

        cancelRun = () => {
          release();
          reject(
            new TickSchedulerError({
              code: 'scheduler.stopped',
              message: 'Tick scheduler was stopped before the run completed.',
              retryable: true,
              context: { ticks },
            }),
          );
        };

        timer = setInterval(() => {
          ticks += 1;
          const result = commandBus.dispatch({ type: 'Tick', nowTs: now() });

          if (result.type !== 'ok') {
            release();
            reject(new TickSchedulerError(result.error));
            return;
          }

          if (completed) {
            release();
            resolve({ ticks, startedAt, finishedAt: now() });
          }
        }, intervalMs);
      });
    },
    stop: () => {
      if (cancelRun) {
        cancelRun();
        return;
      }

      release();
    },
    isRunning: () => timer !== null,
  };
}
