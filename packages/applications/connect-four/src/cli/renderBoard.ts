/**
 * @fileoverview Text rendering of a session snapshot.
 */

import { opponentOf, type ParticipantNumber } from '@relay-four/framework-protocol';
import type { SessionSnapshot } from '../session/GameSession.js';
import { ANONYMOUS_NAME, BOARD_COLUMNS, BOARD_ROWS } from '../shared/constants.js';

/** Piece glyph per player: red moves first, yellow second */
export const PIECE_GLYPHS: Readonly<Record<ParticipantNumber, string>> = {
  1: 'R',
  2: 'Y',
};

export const EMPTY_CELL = '.';

export const COLUMN_RULER = Array.from({ length: BOARD_COLUMNS }, (_, column) =>
  String(column + 1)
).join(' ');

/**
 * One-line status as seen by the local player.
 */
export function statusLine(snapshot: SessionSnapshot): string {
  const { phase, board, localPlayer } = snapshot;

  switch (phase) {
    case 'rejected':
      return 'not your game';
    case 'awaiting_opponent':
      return 'waiting for opponent..';
    case 'won':
      return board.winner === localPlayer ? 'you win!!' : 'you lose';
    case 'settling':
      return 'waiting..';
    case 'in_progress':
      return board.playerTurn === localPlayer ? 'your turn' : 'waiting..';
  }
}

/**
 * Who plays which color, once both players are bound.
 */
export function playersLine(snapshot: SessionSnapshot): string | null {
  const { localPlayer } = snapshot;
  if (localPlayer === null) return null;

  const local = `${PIECE_GLYPHS[localPlayer]} (${snapshot.localName ?? ANONYMOUS_NAME})`;
  const opponentGlyph = PIECE_GLYPHS[opponentOf(localPlayer)];
  const opponent = `${opponentGlyph} (${snapshot.opponentName ?? ANONYMOUS_NAME})`;
  return `you: ${local}  opponent: ${opponent}`;
}

/**
 * Board rows top to bottom, the column ruler, then the status line.
 */
export function renderBoard(snapshot: SessionSnapshot): string {
  const lines: string[] = [];

  const players = playersLine(snapshot);
  if (players !== null) {
    lines.push(players);
  }

  for (let row = BOARD_ROWS - 1; row >= 0; row--) {
    const cells: string[] = [];
    for (let column = 0; column < BOARD_COLUMNS; column++) {
      const owner = snapshot.board.cellAt(column, row);
      cells.push(owner === null ? EMPTY_CELL : PIECE_GLYPHS[owner]);
    }
    lines.push(cells.join(' '));
  }

  lines.push(COLUMN_RULER);
  lines.push(statusLine(snapshot));
  return lines.join('\n');
}
