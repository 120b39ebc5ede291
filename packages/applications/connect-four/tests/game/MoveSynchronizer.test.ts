import { BoundedChannel } from '@relay-four/framework-client';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MoveSynchronizer } from '../../src/game/MoveSynchronizer.js';
import { ManualDropAnimator } from '../helpers/ManualDropAnimator.js';

function drainOutbound(outbound: BoundedChannel<string>): string[] {
  const sent: string[] = [];
  for (let item = outbound.tryReceive(); item !== undefined; item = outbound.tryReceive()) {
    sent.push(item);
  }
  return sent;
}

describe('MoveSynchronizer', () => {
  let outbound: BoundedChannel<string>;
  let animator: ManualDropAnimator;
  let onSettled: ReturnType<typeof vi.fn>;
  let sync: MoveSynchronizer;

  beforeEach(() => {
    outbound = new BoundedChannel<string>('outbound', 16);
    animator = new ManualDropAnimator();
    onSettled = vi.fn();
    sync = new MoveSynchronizer({ outbound, animator, onSettled });
  });

  function playLocal(column: number): void {
    expect(sync.submitLocalMove(column).ok).toBe(true);
    animator.settleNext();
  }

  function playRemote(column: number, seat: 1 | 2): void {
    expect(sync.receiveRemoteMove(column, seat).ok).toBe(true);
    animator.settleNext();
  }

  describe('before an opponent is bound', () => {
    it('should refuse local moves', () => {
      const result = sync.submitLocalMove(0);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('awaiting_opponent');
      expect(sync.phase).toBe('awaiting_opponent');
      expect(outbound.size).toBe(0);
    });

    it('should refuse remote moves', () => {
      const result = sync.receiveRemoteMove(0, 2);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('awaiting_opponent');
    });
  });

  describe('submitLocalMove', () => {
    beforeEach(() => {
      sync.bindSeat(1);
    });

    it('should apply and publish a legal move', () => {
      const result = sync.submitLocalMove(3);

      expect(result).toEqual({ ok: true, move: { player: 1, column: 3, row: 0 } });
      expect(drainOutbound(outbound)).toEqual(['{"type":"move_input","column":3}']);
      expect(sync.phase).toBe('settling');
      expect(animator.started).toEqual([{ player: 1, column: 3, row: 0 }]);
    });

    it('should refuse a second drop while the first is settling', () => {
      sync.submitLocalMove(3);

      const result = sync.submitLocalMove(4);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('move_in_progress');
      expect(sync.board.moves).toHaveLength(1);
    });

    it('should pass the turn once the piece settles', () => {
      playLocal(3);

      expect(sync.phase).toBe('in_progress');
      expect(sync.board.playerTurn).toBe(2);
      expect(onSettled).toHaveBeenCalledTimes(1);
    });

    it('should refuse moves out of turn', () => {
      playLocal(3);
      drainOutbound(outbound);

      const result = sync.submitLocalMove(3);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('out_of_turn');
      expect(outbound.size).toBe(0);
    });

    it('should refuse a seventh piece in a column without publishing', () => {
      for (let i = 0; i < 3; i++) {
        playLocal(0);
        playRemote(0, 2);
      }
      drainOutbound(outbound);

      const result = sync.submitLocalMove(0);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('column_full');
      expect(sync.board.moves).toHaveLength(6);
      expect(outbound.size).toBe(0);
    });

    it('should refuse illegal columns without publishing', () => {
      const result = sync.submitLocalMove(7);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('illegal_column');
      expect(outbound.size).toBe(0);
    });
  });

  describe('receiveRemoteMove', () => {
    beforeEach(() => {
      sync.bindSeat(2);
    });

    it('should apply the opponent move without publishing it', () => {
      const result = sync.receiveRemoteMove(5, 1);

      expect(result).toEqual({ ok: true, move: { player: 1, column: 5, row: 0 } });
      expect(outbound.size).toBe(0);
    });

    it('should refuse moves from neither player', () => {
      const result = sync.receiveRemoteMove(5, null);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('unknown_author');
      expect(sync.board.moves).toEqual([]);
    });

    it('should refuse a move from the player not on turn', () => {
      playRemote(5, 1);

      const result = sync.receiveRemoteMove(5, 1);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.violation.reason).toBe('out_of_turn');
    });
  });

  describe('winning', () => {
    it('should end the game on four in a row', () => {
      sync.bindSeat(1);
      playLocal(0);
      playRemote(6, 2);
      playLocal(0);
      playRemote(6, 2);
      playLocal(0);
      playRemote(6, 2);
      playLocal(0);

      expect(sync.phase).toBe('won');
      expect(sync.board.winner).toBe(1);
    });

    it('should refuse every move after the game is won', () => {
      sync.bindSeat(2);
      playRemote(0, 1);
      playLocal(6);
      playRemote(0, 1);
      playLocal(6);
      playRemote(0, 1);
      playLocal(6);
      playRemote(0, 1);

      const local = sync.submitLocalMove(3);
      const remote = sync.receiveRemoteMove(3, 1);

      expect(local.ok).toBe(false);
      if (!local.ok) expect(local.violation.reason).toBe('game_over');
      expect(remote.ok).toBe(false);
      if (!remote.ok) expect(remote.violation.reason).toBe('game_over');
    });
  });

  describe('reset', () => {
    beforeEach(() => {
      sync.bindSeat(1);
    });

    it('should clear the board and publish a reset on request', () => {
      playLocal(2);
      drainOutbound(outbound);

      sync.requestReplay();

      expect(sync.board.moves).toEqual([]);
      expect(sync.board.playerTurn).toBe(1);
      expect(drainOutbound(outbound)).toEqual(['{"type":"reset_session"}']);
    });

    it('should clear the board without publishing on a received reset', () => {
      playLocal(2);
      drainOutbound(outbound);

      sync.receiveReset();

      expect(sync.board.moves).toEqual([]);
      expect(outbound.size).toBe(0);
    });

    it('should clear a won game on reset', () => {
      playLocal(0);
      playRemote(6, 2);
      playLocal(0);
      playRemote(6, 2);
      playLocal(0);
      playRemote(6, 2);
      playLocal(0);

      sync.receiveReset();

      expect(sync.board.moves).toEqual([]);
      expect(sync.board.winner).toBeNull();
      expect(sync.board.inProgress).toBe(false);
      expect(sync.phase).toBe('in_progress');
    });

    it('should ignore a piece that lands after a reset', () => {
      sync.submitLocalMove(2);
      sync.receiveReset();

      animator.settleNext();

      expect(sync.board.moves).toEqual([]);
      expect(sync.board.playerTurn).toBe(1);
      expect(onSettled).not.toHaveBeenCalled();
    });
  });
});
