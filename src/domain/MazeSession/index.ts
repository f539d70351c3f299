import {
  MAZE_DEFAULT_HEIGHT,
  MAZE_DEFAULT_WIDTH,
  MAZE_MAX_DIMENSION,
  MAZE_MIN_DIMENSION,
} from '../../config/maze-defaults';
import { MODULE_IDS } from '../../shared/module-ids';
import { createMathRandomSource, type RandomSource } from '../../shared/random';
import {
  GENERATOR_NAMES,
  createMazeGenerator,
  type MazeGenerator,
  type MazeGeneratorProgress,
} from '../MazeGenerator';
import {
  MazeInvariantError,
  clearSolutions,
  cloneMazeCell,
  createMazeCells,
  markEndpoints,
  type MazeCell,
  type MazeDimensions,
} from '../MazeGrid';
import {
  SOLVER_NAMES,
  createMazeSolver,
  type MazeSolver,
  type MazeSolverProgress,
} from '../MazeSolver';

export type MazePhase = 'generate' | 'solve' | 'complete' | 'failed';

export interface MazeEndpoints {
  readonly from: number;
  readonly to: number;
}

export interface MazeSessionFailure {
  readonly code: string;
  readonly message: string;
}

export interface MazeSessionSnapshot {
  readonly dimensions: MazeDimensions;
  readonly phase: MazePhase;
  readonly generatorName: string;
  readonly solverName: string;
  readonly endpoints: MazeEndpoints | null;
  readonly generationSteps: number;
  readonly solveSteps: number;
  readonly failure: MazeSessionFailure | null;
  readonly cells: readonly MazeCell[];
}

export type MazeProgressNotice =
  | { readonly source: 'generator'; readonly progress: MazeGeneratorProgress }
  | { readonly source: 'solver'; readonly progress: MazeSolverProgress };

export interface MazeSessionTickResult {
  readonly previousPhase: MazePhase;
  readonly phase: MazePhase;
  readonly advanced: boolean;
  readonly endpoints: MazeEndpoints | null;
  readonly notices: readonly MazeProgressNotice[];
}

export interface StartGenerationRequest {
  readonly width?: number;
  readonly height?: number;
  readonly generatorName?: string;
}

export interface SolveRequest {
  readonly solverName?: string;
  // pick a fresh random pair instead of keeping the current one
  readonly withNewLocations?: boolean;
  readonly endpoints?: MazeEndpoints;
}

export interface MazeSessionModuleOptions {
  readonly random?: RandomSource;
  readonly width?: number;
  readonly height?: number;
  readonly generatorName?: string;
  readonly solverName?: string;
}

export interface MazeSessionModule {
  readonly moduleName: typeof MODULE_IDS.mazeSession;
  startGeneration: (request?: StartGenerationRequest) => MazeSessionSnapshot;
  requestSolve: (request?: SolveRequest) => MazeSessionSnapshot;
  tick: () => MazeSessionTickResult;
  getSnapshot: () => MazeSessionSnapshot;
}

export class MazeSessionDomainError extends Error {
  readonly code: string;
  readonly retryable: false;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(`[maze-session] ${message}`);
    this.name = 'MazeSessionDomainError';
    this.code = code;
    this.retryable = false;
    this.context = context;
  }
}

export function normalizeDimension(value: number | undefined, fallback: number): number {
  const candidate = value === undefined || !Number.isFinite(value) ? fallback : Math.trunc(value);
  return Math.max(MAZE_MIN_DIMENSION, Math.min(MAZE_MAX_DIMENSION, candidate));
}

function resolveAlgorithmName(
  kind: 'generator' | 'solver',
  requested: string | undefined,
  current: string,
  known: readonly string[],
): string {
  if (requested === undefined) {
    return current;
  }

  if (!known.includes(requested)) {
    throw new MazeSessionDomainError(`session.unknown-${kind}`, `Unknown ${kind} "${requested}".`, {
      requested,
      known,
    });
  }

  return requested;
}

function firstName(names: readonly string[], kind: string): string {
  const [name] = names;
  if (name === undefined) {
    throw new MazeSessionDomainError('session.empty-registry', `No ${kind} is registered.`);
  }

  return name;
}

export function createMazeSessionModule(options: MazeSessionModuleOptions = {}): MazeSessionModule {
  const random = options.random ?? createMathRandomSource();
  let dimensions: MazeDimensions = {
    width: normalizeDimension(options.width, MAZE_DEFAULT_WIDTH),
    height: normalizeDimension(options.height, MAZE_DEFAULT_HEIGHT),
  };
  let generatorName = resolveAlgorithmName(
    'generator',
    options.generatorName,
    firstName(GENERATOR_NAMES, 'generator'),
    GENERATOR_NAMES,
  );
  let solverName = resolveAlgorithmName(
    'solver',
    options.solverName,
    firstName(SOLVER_NAMES, 'solver'),
    SOLVER_NAMES,
  );
  let cells: MazeCell[] = createMazeCells(dimensions);
  let phase: MazePhase = 'generate';
  let endpoints: MazeEndpoints | null = null;
  let generationSteps = 0;
  let solveSteps = 0;
  let failure: MazeSessionFailure | null = null;
  let pendingNotices: MazeProgressNotice[] = [];

  const instantiateGenerator = (): MazeGenerator => {
    const generator = createMazeGenerator(generatorName, {
      random,
      onProgress: (progress) => {
        pendingNotices.push({ source: 'generator', progress });
      },
    });

    if (!generator) {
      throw new MazeSessionDomainError('session.unknown-generator', 'Generator is missing.', {
        generatorName,
      });
    }

    return generator;
  };

  const instantiateSolver = (): MazeSolver => {
    const solver = createMazeSolver(solverName, {
      random,
      onProgress: (progress) => {
        pendingNotices.push({ source: 'solver', progress });
      },
    });

    if (!solver) {
      throw new MazeSessionDomainError('session.unknown-solver', 'Solver is missing.', {
        solverName,
      });
    }

    return solver;
  };

  let generator = instantiateGenerator();
  let solver = instantiateSolver();

  const pickRandomEndpoints = (): MazeEndpoints => {
    const total = cells.length;
    const from = random.nextIndex(total);
    // uniform over the other cells so the pair is always distinct
    const to = (from + 1 + random.nextIndex(total - 1)) % total;
    return { from, to };
  };

  const validateEndpoints = (candidate: MazeEndpoints): MazeEndpoints => {
    const total = cells.length;
    const isInside = (cell: number): boolean =>
      Number.isSafeInteger(cell) && cell >= 0 && cell < total;

    if (!isInside(candidate.from) || !isInside(candidate.to) || candidate.from === candidate.to) {
      throw new MazeSessionDomainError(
        'session.invalid-endpoints',
        'Endpoints must be two distinct cells inside the grid.',
        { from: candidate.from, to: candidate.to, cellCount: total },
      );
    }

    return { from: candidate.from, to: candidate.to };
  };

  const beginSolve = (nextEndpoints: MazeEndpoints): void => {
    clearSolutions(cells);
    endpoints = nextEndpoints;
    markEndpoints(cells, nextEndpoints.from, nextEndpoints.to);
    solver = instantiateSolver();
    solveSteps = 0;
    phase = 'solve';
  };

  const getSnapshot = (): MazeSessionSnapshot => ({
    dimensions,
    phase,
    generatorName,
    solverName,
    endpoints,
    generationSteps,
    solveSteps,
    failure,
    cells: cells.map(cloneMazeCell),
  });

  const advance = (): boolean => {
    switch (phase) {
      case 'generate': {
        generationSteps += 1;
        if (!generator.step(dimensions, cells)) {
          beginSolve(pickRandomEndpoints());
        }
        return true;
      }
      case 'solve': {
        if (!endpoints) {
          throw new MazeInvariantError('session.missing-endpoints', 'Solve has no endpoints.');
        }

        solveSteps += 1;
        if (!solver.step(dimensions, cells, endpoints.from, endpoints.to)) {
          phase = 'complete';
        }
        return true;
      }
      case 'complete':
      case 'failed':
        return false;
    }
  };

  return {
    moduleName: MODULE_IDS.mazeSession,
    startGeneration: (request = {}) => {
      const nextGeneratorName = resolveAlgorithmName(
        'generator',
        request.generatorName,
        generatorName,
        GENERATOR_NAMES,
      );

      dimensions = {
        width: normalizeDimension(request.width, dimensions.width),
        height: normalizeDimension(request.height, dimensions.height),
      };
      generatorName = nextGeneratorName;
      cells = createMazeCells(dimensions);
      generator = instantiateGenerator();
      phase = 'generate';
      endpoints = null;
      generationSteps = 0;
      solveSteps = 0;
      failure = null;
      pendingNotices = [];

      return getSnapshot();
    },
    requestSolve: (request = {}) => {
      if (phase === 'generate' || phase === 'failed') {
        throw new MazeSessionDomainError(
          'session.solve-unavailable',
          'Solving needs a completely generated maze.',
          { phase },
        );
      }

      solverName = resolveAlgorithmName('solver', request.solverName, solverName, SOLVER_NAMES);

      let nextEndpoints: MazeEndpoints;
      if (request.endpoints) {
        nextEndpoints = validateEndpoints(request.endpoints);
      } else if (request.withNewLocations === true || !endpoints) {
        nextEndpoints = pickRandomEndpoints();
      } else {
        nextEndpoints = endpoints;
      }

      beginSolve(nextEndpoints);
      return getSnapshot();
    },
    tick: () => {
      const previousPhase = phase;
      pendingNotices = [];
      let advanced: boolean;

      try {
        advanced = advance();
      } catch (error: unknown) {
        if (error instanceof MazeInvariantError) {
          phase = 'failed';
          failure = { code: error.code, message: error.message };
        }

        throw error;
      }

      const notices = pendingNotices;
      pendingNotices = [];

      return {
        previousPhase,
        phase,
        advanced,
        endpoints: previousPhase === 'generate' && phase === 'solve' ? endpoints : null,
        notices,
      };
    },
    getSnapshot,
  };
}
