/**
 * @fileoverview Pairs two identities into one match.
 *
 * The role comes from the stored history of the match:
 * - nothing stored: we are first, announce a new game
 * - newest entry is someone else's announcement: join it as player 2
 * - anything else: wait for a join naming us, replayed or live
 *
 * A join naming two other identities rejects the session for good, even
 * after it started. Two players announcing at the same moment can both
 * end up claiming a seat. There is no tie-break.
 */

import { type ChannelSender, logger } from '@relay-four/framework-client';
import {
  type ParticipantNumber,
  ProtocolViolation,
  type PublicKey,
  type RelayEnvelope,
  type SessionRole,
} from '@relay-four/framework-protocol';
import { sendMessage } from '../shared/outbound.js';
import {
  type AnnounceJoinMessage,
  decodeMessage,
  isMatchmakingMessage,
  type MatchmakingMessage,
  type Players,
} from '../shared/protocol.js';

/**
 * The bound opponent.
 */
export interface Opponent {
  readonly publicKey: PublicKey;
  readonly name: string | null;
}

/**
 * What handling a matchmaking step did.
 */
export type MatchmakingOutcome =
  | { readonly type: 'none' }
  | { readonly type: 'announced' }
  | {
      readonly type: 'started';
      readonly localPlayer: ParticipantNumber;
      readonly opponent: Opponent;
    }
  | { readonly type: 'rejected' }
  | { readonly type: 'violation'; readonly violation: ProtocolViolation };

export interface BacklogResolution {
  readonly outcome: MatchmakingOutcome;
  /** Entries to process as if received live, oldest first */
  readonly replay: readonly RelayEnvelope[];
}

export interface MatchmakingConfig {
  readonly identity: PublicKey;
  readonly displayName: string | null;
  readonly outbound: ChannelSender<string>;
}

export class MatchmakingProtocol {
  private _role: SessionRole = 'unassigned';
  private _started = false;
  private _opponent: Opponent | null = null;
  private backlogResolved = false;

  constructor(private readonly config: MatchmakingConfig) {}

  // ============ Getters ============

  get role(): SessionRole {
    return this._role;
  }

  /** True once both identities are bound */
  get started(): boolean {
    return this._started;
  }

  get opponent(): Opponent | null {
    return this._opponent;
  }

  // ============ Matchmaking ============

  /**
   * Decide the role from the stored history of the match. Runs once.
   * @param events - Stored events, oldest first
   */
  resolveBacklog(events: readonly RelayEnvelope[]): BacklogResolution {
    if (this.backlogResolved) {
      logger.warn('Backlog already resolved, ignoring');
      return { outcome: { type: 'none' }, replay: [] };
    }
    this.backlogResolved = true;

    const replay = events.filter((event) => !this.isOwnAnnouncement(event));
    const last = events[events.length - 1];

    if (last === undefined) {
      logger.info('No stored events, announcing a new game');
      this._role = 'player1';
      sendMessage(this.config.outbound, {
        type: 'announce_new_game',
        displayName: this.config.displayName,
      });
      return { outcome: { type: 'announced' }, replay };
    }

    const decoded = decodeMessage(last.content);
    if (
      last.author !== this.config.identity &&
      decoded.ok &&
      decoded.message.type === 'announce_new_game'
    ) {
      const announcedName = decoded.message.displayName;
      const outcome = this.start(2, { publicKey: last.author, name: announcedName });
      const players: Players = {
        p1Name: announcedName,
        p2Name: this.config.displayName,
        p1Identity: last.author,
        p2Identity: this.config.identity,
      };
      sendMessage(this.config.outbound, { type: 'announce_join', players });
      return { outcome, replay };
    }

    logger.info('Newest stored event is no open announcement, waiting for a join');
    return { outcome: { type: 'none' }, replay };
  }

  /**
   * Handle an announcement received live or replayed from the backlog.
   */
  handleMessage(author: PublicKey, message: MatchmakingMessage): MatchmakingOutcome {
    if (this._role === 'rejected') {
      return { type: 'violation', violation: new ProtocolViolation('session_rejected') };
    }
    if (message.type === 'announce_join' && !this.isNamedIn(message.players)) {
      logger.info('Not your game', {
        p1: message.players.p1Identity,
        p2: message.players.p2Identity,
      });
      this._role = 'rejected';
      return { type: 'rejected' };
    }
    if (this._started) {
      logger.debug('Ignoring late matchmaking message', { type: message.type, author });
      return { type: 'violation', violation: new ProtocolViolation('already_started') };
    }
    if (author === this.config.identity) {
      return { type: 'none' };
    }

    if (message.type === 'announce_new_game') {
      return this.start(2, { publicKey: author, name: message.displayName });
    }
    return this.handleJoin(message);
  }

  // ============ Private Methods ============

  private isNamedIn(players: Players): boolean {
    const self = this.config.identity;
    return players.p1Identity === self || players.p2Identity === self;
  }

  private handleJoin(message: AnnounceJoinMessage): MatchmakingOutcome {
    const { players } = message;
    if (players.p1Identity === this.config.identity) {
      return this.start(1, { publicKey: players.p2Identity, name: players.p2Name });
    }
    return this.start(2, { publicKey: players.p1Identity, name: players.p1Name });
  }

  private start(localPlayer: ParticipantNumber, opponent: Opponent): MatchmakingOutcome {
    this._role = localPlayer === 1 ? 'player1' : 'player2';
    this._started = true;
    this._opponent = opponent;
    logger.info('Match started', { role: this._role, opponent: opponent.publicKey });
    return { type: 'started', localPlayer, opponent };
  }

  private isOwnAnnouncement(event: RelayEnvelope): boolean {
    if (event.author !== this.config.identity) return false;
    const decoded = decodeMessage(event.content);
    return decoded.ok && isMatchmakingMessage(decoded.message);
  }
}
