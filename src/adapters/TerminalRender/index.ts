import type {
  ApplicationEventBus,
  ApplicationReadModel,
  MazeSnapshot,
  MazeSnapshotCell,
} from '../../application';
import { MODULE_IDS } from '../../shared/module-ids';

// bit values of the grid's wall mask
const WALL_NORTH = 0b0001;
const WALL_EAST = 0b0010;
const WALL_SOUTH = 0b0100;
const WALL_WEST = 0b1000;

const CORNER = '+';
const HORIZONTAL_WALL = '---';
const HORIZONTAL_GAP = '   ';
const VERTICAL_WALL = '|';
const VERTICAL_GAP = ' ';
const UNTOUCHED_BODY = '###';
const CLEAR_SCREEN = '\u001b[H\u001b[2J';

export interface TerminalRenderOutput {
  write: (chunk: string) => unknown;
}

export interface TerminalRenderModuleOptions {
  readonly output: TerminalRenderOutput;
  readonly clearScreen?: boolean;
}

export interface TerminalRenderModule {
  readonly moduleName: typeof MODULE_IDS.terminalRender;
  start: () => void;
  stop: () => void;
  renderNow: () => string;
  getFrameCount: () => number;
}

function hasWallBit(cell: MazeSnapshotCell | undefined, wall: number): boolean {
  return cell === undefined || (cell.walls & wall) !== 0;
}

function cellMarker(cell: MazeSnapshotCell): string {
  const { solution } = cell;

  if (solution.from) {
    return 'o';
  }

  if (solution.to) {
    return 'x';
  }

  if (solution.result) {
    return '*';
  }

  if (solution.previous !== null) {
    return '.';
  }

  return ' ';
}

function cellBody(cell: MazeSnapshotCell | undefined): string {
  // cells no generator has reached yet are drawn solid
  if (cell === undefined || cell.walk === null) {
    return UNTOUCHED_BODY;
  }

  return ` ${cellMarker(cell)} `;
}

/** Draws walls, endpoints and explored/final path cells as text rows. */
export function renderMazeFrame(
  snapshot: Pick<MazeSnapshot, 'dimensions' | 'cells'>,
): string[] {
  const { width, height } = snapshot.dimensions;
  const rows: string[] = [];

  for (let row = 0; row < height; row += 1) {
    let top = '';
    let middle = '';

    for (let col = 0; col < width; col += 1) {
      const cell = snapshot.cells[row * width + col];
      top += CORNER + (hasWallBit(cell, WALL_NORTH) ? HORIZONTAL_WALL : HORIZONTAL_GAP);
      middle += (hasWallBit(cell, WALL_WEST) ? VERTICAL_WALL : VERTICAL_GAP) + cellBody(cell);
    }

    const lastCell = snapshot.cells[row * width + width - 1];
    rows.push(top + CORNER);
    rows.push(middle + (hasWallBit(lastCell, WALL_EAST) ? VERTICAL_WALL : VERTICAL_GAP));
  }

  let bottom = '';
  for (let col = 0; col < width; col += 1) {
    const cell = snapshot.cells[(height - 1) * width + col];
    bottom += CORNER + (hasWallBit(cell, WALL_SOUTH) ? HORIZONTAL_WALL : HORIZONTAL_GAP);
  }
  rows.push(bottom + CORNER);

  return rows;
}

export function renderStatusLine(snapshot: MazeSnapshot): string {
  const steps = `generate ${snapshot.generationSteps} / solve ${snapshot.solveSteps} steps`;
  const parts = [snapshot.phase, snapshot.generatorName, snapshot.solverName, steps];
  if (snapshot.failure) {
    parts.push(snapshot.failure.code);
  }

  return parts.join(' | ');
}

export function createTerminalRenderModule(
  readModel: ApplicationReadModel,
  eventBus: ApplicationEventBus,
  options: TerminalRenderModuleOptions,
): TerminalRenderModule {
  const clearScreen = options.clearScreen ?? true;
  let unsubscribe: (() => void) | null = null;
  let frameCount = 0;

  const renderNow = (): string => {
    const snapshot = readModel.getMazeSnapshot();
    return [...renderMazeFrame(snapshot), renderStatusLine(snapshot)].join('\n');
  };

  const paint = (): void => {
    frameCount += 1;
    options.output.write(`${clearScreen ? CLEAR_SCREEN : ''}${renderNow()}\n`);
  };

  return {
    moduleName: MODULE_IDS.terminalRender,
    start: () => {
      if (unsubscribe) {
        return;
      }

      unsubscribe = eventBus.subscribe((event) => {
        if (
          (event.eventType === 'application/tick' && event.payload.advanced) ||
          event.eventType === 'domain/maze-failed'
        ) {
          paint();
        }
      });
    },
    stop: () => {
      if (unsubscribe) {
        unsubscribe();
        unsubscribe = null;
      }
    },
    renderNow,
    getFrameCount: () => frameCount,
  };
}
