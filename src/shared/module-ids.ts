export const MODULE_IDS = Object.freeze({
  mazeSession: 'MazeSession',
  terminalRender: 'TerminalRender',
  tickScheduler: 'TickScheduler',
  telemetry: 'Telemetry',
});
