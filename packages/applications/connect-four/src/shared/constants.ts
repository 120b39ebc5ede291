/**
 * @fileoverview Connect Four constants shared by game logic and renderer.
 */

/** Number of columns on the board */
export const BOARD_COLUMNS = 7;

/** Number of rows on the board; also the capacity of a column */
export const BOARD_ROWS = 6;

/** Contiguous pieces needed to win */
export const WIN_LENGTH = 4;

/** Display name used when the settings store has none */
export const ANONYMOUS_NAME = 'anonymous';
