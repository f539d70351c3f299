import type {
  AlgorithmCatalog,
  ApplicationCommand,
  ApplicationError,
  ApplicationEvent,
  ApplicationEventBus,
  ApplicationEventListener,
  ApplicationLayer,
  ApplicationQuery,
  ApplicationQueryBus,
  ApplicationQueryPayload,
  ApplicationReadModel,
  ApplicationResult,
  CommandAck,
  DomainModules,
  RoutedCommandType,
} from './contracts';
import { GENERATOR_NAMES } from '../domain/MazeGenerator';
import { MazeInvariantError } from '../domain/MazeGrid';
import { MazeSessionDomainError, type MazeSessionTickResult } from '../domain/MazeSession';
import { SOLVER_NAMES } from '../domain/MazeSolver';
import { toErrorMessage } from '../shared/errors';

function assertNever(value: never): never {
  throw new Error(`Unsupported command: ${JSON.stringify(value)}`);
}

function createError(
  code: string,
  message: string,
  retryable: boolean,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationError {
  return { code, message, retryable, context };
}

function ok<TValue>(value: TValue): ApplicationResult<TValue> {
  return { type: 'ok', value };
}

function domainError<TValue>(
  code: string,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationResult<TValue> {
  return {
    type: 'domainError',
    error: createError(code, message, false, context),
  };
}

function infraError<TValue>(
  code: string,
  message: string,
  retryable: boolean,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationResult<TValue> {
  return {
    type: 'infraError',
    error: createError(code, message, retryable, context),
  };
}

const EVENT_VERSIONS: Readonly<Record<ApplicationEvent['eventType'], number>> = {
  'application/tick': 1,
  'application/command-routed': 1,
  'domain/generation-progress': 1,
  'domain/solve-progress': 1,
  'domain/phase-changed': 1,
  'domain/maze-failed': 1,
};

const ALGORITHM_CATALOG: AlgorithmCatalog = Object.freeze({
  generators: GENERATOR_NAMES,
  solvers: SOLVER_NAMES,
});

export function createApplicationLayer(modules: DomainModules): ApplicationLayer {
  type EventType = ApplicationEvent['eventType'];
  type EventByType<TType extends EventType> = Extract<ApplicationEvent, { eventType: TType }>;

  const eventListeners = new Set<ApplicationEventListener>();
  let eventSequence = 0;
  let correlationSequence = 0;

  const publish = (event: ApplicationEvent): void => {
    eventListeners.forEach((listener) => {
      listener(event);
    });
  };

  const eventBus: ApplicationEventBus = {
    publish,
    subscribe: (listener) => {
      eventListeners.add(listener);
      return () => {
        eventListeners.delete(listener);
      };
    },
  };

  const createCorrelationId = (commandType: ApplicationCommand['type']): string => {
    correlationSequence += 1;
    return `${commandType}-${Date.now()}-${correlationSequence}`;
  };

  const createEvent = <TType extends EventType>(
    eventType: TType,
    correlationId: string,
    payload: EventByType<TType>['payload'],
    occurredAt: number = Date.now(),
  ): EventByType<TType> => {
    eventSequence += 1;
    return {
      eventId: `evt-${occurredAt}-${eventSequence}`,
      eventType,
      eventVersion: EVENT_VERSIONS[eventType],
      occurredAt,
      correlationId,
      payload,
    } as EventByType<TType>;
  };

  const acknowledge = (
    commandType: ApplicationCommand['type'],
    correlationId: string,
  ): ApplicationResult<CommandAck> =>
    ok({
      commandType,
      handledAt: Date.now(),
      correlationId,
    });

  const routeCommand = (
    commandType: RoutedCommandType,
    emitDomainEvents?: (correlationId: string) => void,
  ): ApplicationResult<CommandAck> => {
    const correlationId = createCorrelationId(commandType);
    publish(createEvent('application/command-routed', correlationId, { commandType }));
    emitDomainEvents?.(correlationId);
    return acknowledge(commandType, correlationId);
  };

  const publishTickOutcome = (
    tickResult: MazeSessionTickResult,
    correlationId: string,
    nowTs: number,
  ): void => {
    for (const notice of tickResult.notices) {
      if (notice.source === 'generator') {
        publish(
          createEvent('domain/generation-progress', correlationId, notice.progress, nowTs),
        );
      } else {
        publish(createEvent('domain/solve-progress', correlationId, notice.progress, nowTs));
      }
    }

    if (tickResult.previousPhase !== tickResult.phase) {
      publish(
        createEvent(
          'domain/phase-changed',
          correlationId,
          {
            previousPhase: tickResult.previousPhase,
            phase: tickResult.phase,
            endpoints: tickResult.endpoints,
          },
          nowTs,
        ),
      );
    }

    publish(
      createEvent(
        'application/tick',
        correlationId,
        {
          nowTs,
          phase: tickResult.phase,
          advanced: tickResult.advanced,
        },
        nowTs,
      ),
    );
  };

  const commandBus = {
    dispatch: (command: ApplicationCommand): ApplicationResult<CommandAck> => {
      try {
        switch (command.type) {
          case 'Tick': {
            const correlationId = createCorrelationId(command.type);
            const tickResult = modules.mazeSession.tick();
            publishTickOutcome(tickResult, correlationId, command.nowTs);
            return acknowledge(command.type, correlationId);
          }
          case 'StartGeneration': {
            const previousPhase = modules.mazeSession.getSnapshot().phase;
            const snapshot = modules.mazeSession.startGeneration({
              width: command.width,
              height: command.height,
              generatorName: command.generatorName,
            });

            return routeCommand(command.type, (correlationId) => {
              publish(
                createEvent('domain/phase-changed', correlationId, {
                  previousPhase,
                  phase: snapshot.phase,
                  endpoints: null,
                }),
              );
            });
          }
          case 'RequestSolve': {
            const previousPhase = modules.mazeSession.getSnapshot().phase;
            const snapshot = modules.mazeSession.requestSolve({
              solverName: command.solverName,
              withNewLocations: command.withNewLocations,
              endpoints: command.endpoints,
            });

            return routeCommand(command.type, (correlationId) => {
              publish(
                createEvent('domain/phase-changed', correlationId, {
                  previousPhase,
                  phase: snapshot.phase,
                  endpoints: snapshot.endpoints,
                }),
              );
            });
          }
          default: {
            return assertNever(command);
          }
        }
      } catch (error: unknown) {
        if (error instanceof MazeSessionDomainError) {
          return domainError(error.code, error.message, {
            commandType: command.type,
            ...error.context,
          });
        }

        if (error instanceof MazeInvariantError) {
          publish(
            createEvent('domain/maze-failed', createCorrelationId(command.type), {
              code: error.code,
              message: error.message,
            }),
          );

          return infraError('maze.invariant-violated', 'Maze is corrupted; regenerate it.', false, {
            commandType: command.type,
            invariant: error.code,
            reason: error.message,
          });
        }

        return infraError('command.execution-failed', 'Command handler crashed.', true, {
          commandType: command.type,
          reason: toErrorMessage(error),
        });
      }
    },
  };

  const queryBus: ApplicationQueryBus = {
    execute: <TQuery extends ApplicationQuery>(
      query: TQuery,
    ): ApplicationResult<ApplicationQueryPayload<TQuery>> => {
      try {
        switch (query.type) {
          case 'GetMazeSnapshot': {
            return ok(modules.mazeSession.getSnapshot()) as ApplicationResult<
              ApplicationQueryPayload<TQuery>
            >;
          }
          case 'GetAlgorithmCatalog': {
            return ok(ALGORITHM_CATALOG) as ApplicationResult<ApplicationQueryPayload<TQuery>>;
          }
          default: {
            return assertNever(query);
          }
        }
      } catch (error: unknown) {
        return infraError('query.execution-failed', 'Query handler crashed.', true, {
          queryType: query.type,
          reason: toErrorMessage(error),
        });
      }
    },
  };

  const readModel: ApplicationReadModel = {
    getMazeSnapshot: () => {
      const queryResult = queryBus.execute({ type: 'GetMazeSnapshot' });

      if (queryResult.type !== 'ok') {
        throw new Error(
          `[application/read-model] Failed to resolve GetMazeSnapshot: ${queryResult.error.code}`,
        );
      }

      return queryResult.value;
    },
    getAlgorithmCatalog: () => {
      const queryResult = queryBus.execute({ type: 'GetAlgorithmCatalog' });

      if (queryResult.type !== 'ok') {
        throw new Error(
          `[application/read-model] Failed to resolve GetAlgorithmCatalog: ${queryResult.error.code}`,
        );
      }

      return queryResult.value;
    },
  };

  return {
    commands: commandBus,
    queries: queryBus,
    readModel,
    events: eventBus,
  };
}

export type {
  AlgorithmCatalog,
  ApplicationCommand,
  ApplicationCommandBus,
  ApplicationError,
  ApplicationEvent,
  ApplicationEventBus,
  ApplicationLayer,
  ApplicationQuery,
  ApplicationQueryBus,
  ApplicationQueryPayload,
  ApplicationReadModel,
  ApplicationResult,
  CommandAck,
  DomainModules,
  MazeSnapshot,
  MazeSnapshotCell,
} from './contracts';
