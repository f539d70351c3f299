import type { ApplicationEvent, ApplicationEventBus } from '../../application';
import { MODULE_IDS } from '../../shared/module-ids';

const DEFAULT_BUFFER_LIMIT = 1_000;

export interface TelemetryLogger {
  info: (message: string) => void;
  error: (message: string) => void;
}

export interface TelemetryModuleOptions {
  readonly logger?: TelemetryLogger;
  readonly bufferLimit?: number;
}

export interface TelemetryModule {
  readonly moduleName: typeof MODULE_IDS.telemetry;
  start: () => void;
  stop: () => void;
  getBufferedEvents: () => readonly ApplicationEvent[];
}

const consoleLogger: TelemetryLogger = {
  info: (message) => {
    console.info(`[${MODULE_IDS.telemetry}] ${message}`);
  },
  error: (message) => {
    console.error(`[${MODULE_IDS.telemetry}] ${message}`);
  },
};

export function describeEvent(event: ApplicationEvent): string | null {
  switch (event.eventType) {
    case 'domain/generation-progress': {
      const progress = event.payload;
      if (progress.type === 'started') {
        return `create using ${progress.algorithm} (start cell ${progress.startCell})`;
      }

      if (progress.type === 'walk-complete') {
        return `walk ${progress.walk} is complete (${progress.length} cells)`;
      }

      return 'create is complete';
    }
    case 'domain/solve-progress': {
      const progress = event.payload;
      if (progress.type === 'started') {
        return `solve using ${progress.algorithm} from ${progress.from} to ${progress.to}`;
      }

      return `solve is complete (path length ${progress.pathLength})`;
    }
    case 'domain/phase-changed':
      return `phase ${event.payload.previousPhase} -> ${event.payload.phase}`;
    default:
      return null;
  }
}

export function createTelemetryModule(
  eventBus: ApplicationEventBus,
  options: TelemetryModuleOptions = {},
): TelemetryModule {
  const logger = options.logger ?? consoleLogger;
  const bufferLimit = Math.max(1, Math.trunc(options.bufferLimit ?? DEFAULT_BUFFER_LIMIT));
  const bufferedEvents: ApplicationEvent[] = [];
  let unsubscribe: (() => void) | null = null;

  const record = (event: ApplicationEvent): void => {
    bufferedEvents.push(event);
    if (bufferedEvents.length > bufferLimit) {
      bufferedEvents.splice(0, bufferedEvents.length - bufferLimit);
    }

    if (event.eventType === 'domain/maze-failed') {
      logger.error(`maze failed: ${event.payload.code} ${event.payload.message}`);
      return;
    }

    const line = describeEvent(event);
    if (line !== null) {
      logger.info(line);
    }
  };

  return {
    moduleName: MODULE_IDS.telemetry,
    start: () => {
      if (!unsubscribe) {
        unsubscribe = eventBus.subscribe(record);
      }
    },
    stop: () => {
      if (unsubscribe) {
        unsubscribe();
        unsubscribe = null;
      }
    },
    getBufferedEvents: () => bufferedEvents,
  };
}
