/**
 * @fileoverview Per-tick state machine of one match.
 *
 * The frame loop calls tick() on a fixed interval. A tick drains the inbound
 * queue in FIFO order but stops after one accepted move, and never dequeues
 * while a dropped piece is settling: queued moves are judged against a board
 * whose turn has flipped. Nothing here awaits.
 */

import { logger, type SessionEndpoints } from '@relay-four/framework-client';
import {
  type GameTag,
  type InboundItem,
  opponentOf,
  type ParticipantNumber,
  type PublicKey,
  type RelayEnvelope,
  type SessionRole,
} from '@relay-four/framework-protocol';
import type { Board } from '../game/Board.js';
import type { DropAnimator } from '../game/DropAnimator.js';
import { type MoveResult, MoveSynchronizer } from '../game/MoveSynchronizer.js';
import type { SessionPhase } from '../game/types.js';
import { decodeMessage } from '../shared/protocol.js';
import {
  type MatchmakingOutcome,
  MatchmakingProtocol,
  type Opponent,
} from './MatchmakingProtocol.js';

/**
 * Session data owned by the frame loop.
 */
export interface SessionState {
  readonly role: SessionRole;
  readonly started: boolean;
  readonly identity: PublicKey;
  readonly gameTag: GameTag;
  readonly endpoints: SessionEndpoints;
  readonly opponent: Opponent | null;
}

/**
 * What a renderer needs to draw the session.
 */
export interface SessionSnapshot {
  readonly phase: SessionPhase;
  readonly role: SessionRole;
  readonly localPlayer: ParticipantNumber | null;
  readonly board: Board;
  readonly localName: string | null;
  readonly opponentName: string | null;
}

/**
 * Event handlers for session updates.
 */
export interface GameSessionEvents {
  /** A transport problem the player should see */
  onNotice?: (message: string) => void;
  /** Something visible changed */
  onChange?: () => void;
}

export interface GameSessionConfig {
  readonly identity: PublicKey;
  readonly displayName: string | null;
  readonly gameTag: GameTag;
  readonly endpoints: SessionEndpoints;
  readonly animator: DropAnimator;
}

type EnvelopeOutcome = 'move' | 'changed' | 'none';

export class GameSession {
  private readonly matchmaking: MatchmakingProtocol;
  private readonly synchronizer: MoveSynchronizer;
  /** Backlog entries not yet processed */
  private readonly replayQueue: RelayEnvelope[] = [];

  constructor(
    private readonly config: GameSessionConfig,
    private readonly events: GameSessionEvents = {}
  ) {
    this.matchmaking = new MatchmakingProtocol({
      identity: config.identity,
      displayName: config.displayName,
      outbound: config.endpoints.outbound,
    });
    this.synchronizer = new MoveSynchronizer({
      outbound: config.endpoints.outbound,
      animator: config.animator,
      onSettled: () => this.events.onChange?.(),
    });
  }

  // ============ Getters ============

  get state(): SessionState {
    return {
      role: this.matchmaking.role,
      started: this.matchmaking.started,
      identity: this.config.identity,
      gameTag: this.config.gameTag,
      endpoints: this.config.endpoints,
      opponent: this.matchmaking.opponent,
    };
  }

  get phase(): SessionPhase {
    return this.matchmaking.role === 'rejected' ? 'rejected' : this.synchronizer.phase;
  }

  get board(): Board {
    return this.synchronizer.board;
  }

  /** Backlog entries still waiting to be processed */
  get pendingReplay(): number {
    return this.replayQueue.length;
  }

  snapshot(): SessionSnapshot {
    return {
      phase: this.phase,
      role: this.matchmaking.role,
      localPlayer: this.synchronizer.localPlayer,
      board: this.synchronizer.board,
      localName: this.config.displayName,
      opponentName: this.matchmaking.opponent?.name ?? null,
    };
  }

  // ============ Frame Loop ============

  /**
   * Process queued traffic.
   * @returns whether anything visible changed
   */
  tick(): boolean {
    if (this.matchmaking.role === 'rejected') {
      this.discardInbound();
      return false;
    }

    let changed = false;
    while (!this.synchronizer.board.inProgress) {
      const envelope = this.replayQueue.shift();
      if (envelope) {
        const outcome = this.processEnvelope(envelope);
        changed ||= outcome !== 'none';
        if (outcome === 'move' || this.matchmaking.role === 'rejected') break;
        continue;
      }

      const item = this.config.endpoints.inbound.tryReceive();
      if (item === undefined) break;

      const outcome = this.processItem(item);
      changed ||= outcome !== 'none';
      if (outcome === 'move' || this.matchmaking.role === 'rejected') break;
    }

    if (changed) {
      this.events.onChange?.();
    }
    return changed;
  }

  // ============ Local Input ============

  /**
   * Drop a piece for the local player.
   */
  submitLocalMove(column: number): MoveResult {
    const result = this.synchronizer.submitLocalMove(column);
    if (result.ok) {
      this.events.onChange?.();
    }
    return result;
  }

  /**
   * Clear the board and ask the opponent to do the same.
   * @returns false when no opponent is bound
   */
  requestReplay(): boolean {
    if (!this.matchmaking.started || this.matchmaking.role === 'rejected') {
      logger.debug('Replay ignored, no match in progress');
      return false;
    }
    this.synchronizer.requestReplay();
    this.events.onChange?.();
    return true;
  }

  // ============ Private Methods ============

  private processItem(item: InboundItem): EnvelopeOutcome {
    switch (item.type) {
      case 'backlog': {
        const { outcome, replay } = this.matchmaking.resolveBacklog(item.events);
        this.replayQueue.push(...replay);
        logger.info('Backlog resolved', { role: this.matchmaking.role, replay: replay.length });
        return this.applyMatchmaking(outcome) ? 'changed' : 'none';
      }

      case 'event':
        return this.processEnvelope(item.event);

      case 'transport_error':
        logger.warn('Transport notice', { message: item.message });
        this.events.onNotice?.(item.message);
        return 'none';
    }
  }

  private processEnvelope(envelope: RelayEnvelope): EnvelopeOutcome {
    const decoded = decodeMessage(envelope.content);
    if (!decoded.ok) {
      logger.warn('Failed to deserialize message', {
        id: envelope.id,
        error: decoded.error.message,
      });
      return 'none';
    }

    const { message } = decoded;
    switch (message.type) {
      case 'announce_new_game':
      case 'announce_join': {
        const outcome = this.matchmaking.handleMessage(envelope.author, message);
        return this.applyMatchmaking(outcome) ? 'changed' : 'none';
      }

      case 'move_input': {
        const result = this.synchronizer.receiveRemoteMove(
          message.column,
          this.seatOf(envelope.author)
        );
        return result.ok ? 'move' : 'none';
      }

      case 'reset_session': {
        const author = this.seatOf(envelope.author);
        if (this.matchmaking.started && author === null) {
          logger.debug('Ignoring reset from a stranger', { author: envelope.author });
          return 'none';
        }
        this.synchronizer.receiveReset();
        return 'changed';
      }
    }
  }

  private applyMatchmaking(outcome: MatchmakingOutcome): boolean {
    switch (outcome.type) {
      case 'started':
        this.synchronizer.bindSeat(outcome.localPlayer);
        return true;
      case 'rejected':
      case 'announced':
        return true;
      case 'violation':
        logger.debug('Matchmaking message rejected', { reason: outcome.violation.reason });
        return false;
      case 'none':
        return false;
    }
  }

  /**
   * Seat of an event author: the local identity, the opponent, or neither.
   */
  private seatOf(author: PublicKey): ParticipantNumber | null {
    const local = this.synchronizer.localPlayer;
    if (local === null) return null;
    if (author === this.config.identity) return local;
    if (author === this.matchmaking.opponent?.publicKey) return opponentOf(local);
    return null;
  }

  private discardInbound(): void {
    for (
      let item = this.config.endpoints.inbound.tryReceive();
      item !== undefined;
      item = this.config.endpoints.inbound.tryReceive()
    ) {
      if (item.type === 'transport_error') {
        this.events.onNotice?.(item.message);
      }
    }
  }
}
