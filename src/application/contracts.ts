import type { MazeGeneratorProgress } from '../domain/MazeGenerator';
import type {
  MazeEndpoints,
  MazePhase,
  MazeSessionModule,
  MazeSessionSnapshot,
} from '../domain/MazeSession';
import type { MazeSolverProgress } from '../domain/MazeSolver';

export interface DomainModules {
  readonly mazeSession: MazeSessionModule;
}

export type ApplicationCommand =
  | {
      readonly type: 'StartGeneration';
      readonly width?: number;
      readonly height?: number;
      readonly generatorName?: string;
    }
  | {
      readonly type: 'RequestSolve';
      readonly solverName?: string;
      readonly withNewLocations?: boolean;
      readonly endpoints?: MazeEndpoints;
    }
  | { readonly type: 'Tick'; readonly nowTs: number };

export type ApplicationQuery =
  | { readonly type: 'GetMazeSnapshot' }
  | { readonly type: 'GetAlgorithmCatalog' };

export type MazeSnapshot = MazeSessionSnapshot;

export type MazeSnapshotCell = MazeSessionSnapshot['cells'][number];

export interface AlgorithmCatalog {
  readonly generators: readonly string[];
  readonly solvers: readonly string[];
}

export interface ApplicationError {
  readonly code: string;
  readonly message: string;
  readonly retryable: boolean;
  readonly context: Readonly<Record<string, unknown>>;
}

export interface ApplicationOkResult<TValue> {
  readonly type: 'ok';
  readonly value: TValue;
}

export interface ApplicationDomainErrorResult {
  readonly type: 'domainError';
  readonly error: ApplicationError;
}

export interface ApplicationInfraErrorResult {
  readonly type: 'infraError';
  readonly error: ApplicationError;
}

export type ApplicationResult<TValue> =
  | ApplicationOkResult<TValue>
  | ApplicationDomainErrorResult
  | ApplicationInfraErrorResult;

export interface CommandAck {
  readonly commandType: ApplicationCommand['type'];
  readonly handledAt: number;
  readonly correlationId: string;
}

export interface ApplicationCommandBus {
  dispatch: (command: ApplicationCommand) => ApplicationResult<CommandAck>;
}

export type ApplicationQueryPayload<TQuery extends ApplicationQuery> = TQuery extends {
  readonly type: 'GetMazeSnapshot';
}
  ? MazeSessionSnapshot
  : TQuery extends { readonly type: 'GetAlgorithmCatalog' }
    ? AlgorithmCatalog
    : never;

export interface ApplicationQueryBus {
  execute: <TQuery extends ApplicationQuery>(
    query: TQuery,
  ) => ApplicationResult<ApplicationQueryPayload<TQuery>>;
}

export interface ApplicationReadModel {
  getMazeSnapshot: () => MazeSessionSnapshot;
  getAlgorithmCatalog: () => AlgorithmCatalog;
}

export type RoutedCommandType = Exclude<ApplicationCommand['type'], 'Tick'>;

export interface EventEnvelope<TEventType extends string, TPayload> {
  readonly eventId: string;
  readonly eventType: TEventType;
  readonly eventVersion: number;
  readonly occurredAt: number;
  readonly correlationId: string;
  readonly payload: TPayload;
}

export type TickEvent = EventEnvelope<
  'application/tick',
  {
    readonly nowTs: number;
    readonly phase: MazePhase;
    readonly advanced: boolean;
  }
>;

export type CommandRoutedEvent = EventEnvelope<
  'application/command-routed',
  { readonly commandType: RoutedCommandType }
>;

export type GenerationProgressEvent = EventEnvelope<
  'domain/generation-progress',
  MazeGeneratorProgress
>;

export type SolveProgressEvent = EventEnvelope<'domain/solve-progress', MazeSolverProgress>;

export type PhaseChangedEvent = EventEnvelope<
  'domain/phase-changed',
  {
    readonly previousPhase: MazePhase;
    readonly phase: MazePhase;
    readonly endpoints: MazeEndpoints | null;
  }
>;

export type MazeFailedEvent = EventEnvelope<
  'domain/maze-failed',
  {
    readonly code: string;
    readonly message: string;
  }
>;

export type ApplicationEvent =
  | TickEvent
  | CommandRoutedEvent
  | GenerationProgressEvent
  | SolveProgressEvent
  | PhaseChangedEvent
  | MazeFailedEvent;

export type ApplicationEventListener = (event: ApplicationEvent) => void;

export interface ApplicationEventBus {
  publish: (event: ApplicationEvent) => void;
  subscribe: (listener: ApplicationEventListener) => () => void;
}

export interface ApplicationLayer {
  readonly commands: ApplicationCommandBus;
  readonly queries: ApplicationQueryBus;
  readonly readModel: ApplicationReadModel;
  readonly events: ApplicationEventBus;
}
