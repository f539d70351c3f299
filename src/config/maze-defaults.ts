export const MAZE_DEFAULT_WIDTH = 20;
export const MAZE_DEFAULT_HEIGHT = 20;
// below two cells per axis there are no interior walls to carve
export const MAZE_MIN_DIMENSION = 2;
export const MAZE_MAX_DIMENSION = 200;
export const MAZE_TICK_INTERVAL_MS = 1000 / 60;
