/**
 * @fileoverview Parsing of terminal input lines.
 */

import { BOARD_COLUMNS } from '../shared/constants.js';

export type Command =
  | { readonly type: 'drop'; readonly column: number }
  | { readonly type: 'replay' }
  | { readonly type: 'quit' }
  | { readonly type: 'unknown'; readonly input: string };

/**
 * Help text listing the accepted commands.
 */
export const COMMAND_HELP = `1-${BOARD_COLUMNS} drop a piece, r replay, q quit`;

/**
 * Parse one input line. Columns are entered 1-based.
 */
export function parseCommand(line: string): Command {
  const input = line.trim().toLowerCase();

  if (/^\d+$/.test(input)) {
    const column = Number(input) - 1;
    if (column >= 0 && column < BOARD_COLUMNS) {
      return { type: 'drop', column };
    }
  }

  switch (input) {
    case 'r':
    case 'replay':
      return { type: 'replay' };
    case 'q':
    case 'quit':
      return { type: 'quit' };
    default:
      return { type: 'unknown', input };
  }
}
