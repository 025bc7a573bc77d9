export * from './shisen_core';
export { GameSession, PATH_DISPLAY_TICKS, formatDuration, squareAt } from './session/GameSession';
export type { Logger, SessionOptions, SessionState } from './session/GameSession';
export { autoplay } from './demo/autoplay';
export { parseBoard, renderBoard } from './demo/text';
