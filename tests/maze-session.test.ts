import { describe, expect, it } from 'vitest';

import {
  RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR,
  WILSON_GENERATOR,
} from '../src/domain/MazeGenerator';
import { isPerfectMaze } from '../src/domain/MazeGrid';
import {
  MazeSessionDomainError,
  createMazeSessionModule,
  normalizeDimension,
  type MazeSessionModule,
  type MazeSessionTickResult,
} from '../src/domain/MazeSession';
import { A_STAR_TAXICAB_SOLVER, DIJKSTRA_SOLVER } from '../src/domain/MazeSolver';
import { createSeededRandomSource } from '../src/shared/random';

const TICK_LIMIT = 50_000;

function tickUntil(
  session: MazeSessionModule,
  phase: 'solve' | 'complete',
): MazeSessionTickResult[] {
  const results: MazeSessionTickResult[] = [];

  for (let tick = 0; tick < TICK_LIMIT; tick += 1) {
    const result = session.tick();
    results.push(result);
    if (result.phase === phase) {
      return results;
    }
  }

  throw new Error(`Session never reached ${phase}.`);
}

function captureSessionCode(action: () => unknown): string | null {
  try {
    action();
  } catch (error: unknown) {
    if (error instanceof MazeSessionDomainError) {
      return error.code;
    }

    throw error;
  }

  return null;
}

describe('maze session', () => {
  it('clamps dimensions to the supported range', () => {
    expect(normalizeDimension(1, 20)).toBe(2);
    expect(normalizeDimension(0, 20)).toBe(2);
    expect(normalizeDimension(500, 20)).toBe(200);
    expect(normalizeDimension(5.9, 20)).toBe(5);
    expect(normalizeDimension(undefined, 7)).toBe(7);
    expect(normalizeDimension(Number.NaN, 9)).toBe(9);
  });

  it('starts in the generate phase with a fully walled grid and default algorithms', () => {
    const session = createMazeSessionModule({ random: createSeededRandomSource(1) });
    const snapshot = session.getSnapshot();

    expect(snapshot).toMatchObject({
      dimensions: { width: 20, height: 20 },
      phase: 'generate',
      generatorName: RANDOMISED_DEPTH_FIRST_SEARCH_GENERATOR,
      solverName: A_STAR_TAXICAB_SOLVER,
      endpoints: null,
      generationSteps: 0,
      solveSteps: 0,
      failure: null,
    });
    expect(snapshot.cells).toHaveLength(400);
    expect(snapshot.cells.every((cell) => cell.walls === 15 && cell.walk === null)).toBe(true);
  });

  it('generates, picks distinct endpoints and solves to completion', () => {
    const session = createMazeSessionModule({
      random: createSeededRandomSource(11),
      width: 5,
      height: 4,
      generatorName: WILSON_GENERATOR,
      solverName: DIJKSTRA_SOLVER,
    });

    const generation = tickUntil(session, 'solve');
    const transition = generation.at(-1);
    expect(transition).toMatchObject({ previousPhase: 'generate', phase: 'solve', advanced: true });
    expect(transition?.notices).toEqual([
      { source: 'generator', progress: { type: 'complete', algorithm: WILSON_GENERATOR } },
    ]);
    expect(generation.slice(0, -1).every((result) => result.endpoints === null)).toBe(true);

    const solving = session.getSnapshot();
    const endpoints = transition?.endpoints;
    if (!endpoints) {
      throw new Error('Expected endpoints on the generate -> solve transition.');
    }

    expect(solving.endpoints).toEqual(endpoints);
    expect(endpoints.from).not.toBe(endpoints.to);
    expect(isPerfectMaze(solving.dimensions, solving.cells)).toBe(true);
    expect(solving.generationSteps).toBe(generation.length);
    expect(solving.cells[endpoints.from]?.solution.from).toBe(true);
    expect(solving.cells[endpoints.to]?.solution.to).toBe(true);

    const solve = tickUntil(session, 'complete');
    const done = session.getSnapshot();
    expect(done.phase).toBe('complete');
    expect(done.solveSteps).toBe(solve.length);
    expect(done.cells[endpoints.to]?.solution.result).toBe(true);
    expect(done.cells[endpoints.from]?.solution.result).toBe(false);

    expect(session.tick()).toEqual({
      previousPhase: 'complete',
      phase: 'complete',
      advanced: false,
      endpoints: null,
      notices: [],
    });
  });

  it('returns copies of the cells from snapshots', () => {
    const session = createMazeSessionModule({ random: createSeededRandomSource(2), width: 3 });
    const snapshot = session.getSnapshot();
    const firstCell = snapshot.cells[0];
    if (!firstCell) {
      throw new Error('Expected a cell.');
    }

    firstCell.walls = 0;
    expect(session.getSnapshot().cells[0]?.walls).toBe(15);
  });

  it('rejects solving before generation completes and unknown algorithm names', () => {
    const session = createMazeSessionModule({ random: createSeededRandomSource(3), width: 3 });

    expect(captureSessionCode(() => session.requestSolve())).toBe('session.solve-unavailable');
    expect(captureSessionCode(() => session.startGeneration({ generatorName: 'Prim' }))).toBe(
      'session.unknown-generator',
    );
    expect(
      captureSessionCode(() => createMazeSessionModule({ solverName: 'Breadth first search' })),
    ).toBe('session.unknown-solver');
  });

  it('re-solves with kept, explicit or fresh endpoints', () => {
    const session = createMazeSessionModule({
      random: createSeededRandomSource(5),
      width: 4,
      height: 3,
    });
    tickUntil(session, 'complete');
    const kept = session.getSnapshot().endpoints;

    const again = session.requestSolve({ solverName: DIJKSTRA_SOLVER });
    expect(again.phase).toBe('solve');
    expect(again.solverName).toBe(DIJKSTRA_SOLVER);
    expect(again.endpoints).toEqual(kept);
    expect(again.solveSteps).toBe(0);
    expect(
      again.cells.every((cell) => !cell.solution.result && cell.solution.previous === null),
    ).toBe(true);

    const explicit = session.requestSolve({ endpoints: { from: 0, to: 11 } });
    expect(explicit.endpoints).toEqual({ from: 0, to: 11 });
    expect(explicit.cells.filter((cell) => cell.solution.from)).toHaveLength(1);
    expect(explicit.cells[0]?.solution.from).toBe(true);
    expect(explicit.cells[11]?.solution.to).toBe(true);
    tickUntil(session, 'complete');
    expect(session.getSnapshot().cells[11]?.solution.result).toBe(true);

    const fresh = session.requestSolve({ withNewLocations: true });
    expect(fresh.endpoints?.from).not.toBe(fresh.endpoints?.to);

    expect(
      captureSessionCode(() => session.requestSolve({ endpoints: { from: 3, to: 3 } })),
    ).toBe('session.invalid-endpoints');
    expect(
      captureSessionCode(() => session.requestSolve({ endpoints: { from: 0, to: 12 } })),
    ).toBe('session.invalid-endpoints');
  });

  it('restarts generation with new dimensions and a different generator', () => {
    const session = createMazeSessionModule({ random: createSeededRandomSource(8), width: 3 });
    tickUntil(session, 'complete');

    const restarted = session.startGeneration({
      width: 6,
      height: 1,
      generatorName: WILSON_GENERATOR,
    });

    expect(restarted).toMatchObject({
      dimensions: { width: 6, height: 2 },
      phase: 'generate',
      generatorName: WILSON_GENERATOR,
      endpoints: null,
      generationSteps: 0,
      solveSteps: 0,
    });
    expect(restarted.cells).toHaveLength(12);
  });

  it('enters the failed phase when an invariant breaks', () => {
    const session = createMazeSessionModule({
      random: { nextIndex: () => 99 },
      width: 3,
      height: 3,
    });

    expect(() => session.tick()).toThrow('[maze] Cell index is outside of the grid.');
    expect(session.getSnapshot()).toMatchObject({
      phase: 'failed',
      failure: { code: 'cell.out-of-range', message: '[maze] Cell index is outside of the grid.' },
    });
    expect(session.tick().advanced).toBe(false);
    expect(captureSessionCode(() => session.requestSolve())).toBe('session.solve-unavailable');
  });
});
