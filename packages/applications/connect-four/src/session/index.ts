/**
 * @fileoverview Connect Four session exports.
 */

export {
  GameSession,
  type GameSessionConfig,
  type GameSessionEvents,
  type SessionSnapshot,
  type SessionState,
} from './GameSession.js';
export {
  type BacklogResolution,
  type MatchmakingConfig,
  type MatchmakingOutcome,
  MatchmakingProtocol,
  type Opponent,
} from './MatchmakingProtocol.js';
