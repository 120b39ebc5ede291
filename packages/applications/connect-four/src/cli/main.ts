/**
 * @fileoverview `connect-four [session-path]` terminal client.
 *
 * Both players run the binary with the same session path. Without a path a
 * random one is generated and printed for the opponent.
 */

import { randomUUID } from 'node:crypto';
import { createInterface } from 'node:readline';
import {
  configureLogger,
  createChannelBridge,
  EnvSettingsStore,
  loadIdentity,
  logger,
  NetworkActor,
  RelayPool,
  readSessionSettings,
} from '@relay-four/framework-client';
import { createGameTag } from '@relay-four/framework-protocol';
import { loadAppConfig } from '../config/appConfig.js';
import { GameSession } from '../session/GameSession.js';
import { isPeerAnnouncement } from '../shared/protocol.js';
import { COMMAND_HELP, parseCommand } from './commands.js';
import { renderBoard } from './renderBoard.js';
import { TimerDropAnimator } from './TimerDropAnimator.js';

function main(): void {
  const config = loadAppConfig();
  configureLogger({ level: config.logLevel });

  const store = new EnvSettingsStore();
  const settings = readSessionSettings(store);
  const identity = loadIdentity(store);
  const relays = settings.relays.length > 0 ? settings.relays : config.defaultRelays;

  const sessionPath = process.argv[2] ?? randomUUID();
  const gameTag = createGameTag(config.appDomain, sessionPath);

  const bridge = createChannelBridge(config.channelCapacity);
  const actor = new NetworkActor({
    transport: new RelayPool(relays),
    endpoints: bridge.network,
    identity,
    gameTag,
    eventKind: config.eventKind,
    backlogTimeoutMs: config.backlogTimeoutMs,
    identifiesPeer: isPeerAnnouncement,
  });

  const animator = new TimerDropAnimator(config.dropMsPerRow);
  let dirty = true;
  const session = new GameSession(
    {
      identity: identity.publicKey,
      displayName: settings.username,
      gameTag,
      endpoints: bridge.session,
      animator,
    },
    {
      onNotice: (message) => console.log(`! ${message}`),
      onChange: () => {
        dirty = true;
      },
    }
  );

  console.log(`Session: ${sessionPath}`);
  console.log(`Opponent joins with: connect-four ${sessionPath}`);
  console.log(COMMAND_HELP);

  actor.run().catch((error: unknown) => {
    logger.error('Network actor failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  });

  const frameLoop = setInterval(() => {
    session.tick();
    if (dirty) {
      dirty = false;
      console.log(`\n${renderBoard(session.snapshot())}`);
    }
  }, config.tickIntervalMs);

  const input = createInterface({ input: process.stdin });

  const shutdown = (): void => {
    clearInterval(frameLoop);
    animator.dispose();
    actor.shutdown();
    input.close();
  };

  input.on('line', (line) => {
    const command = parseCommand(line);
    switch (command.type) {
      case 'drop': {
        const result = session.submitLocalMove(command.column);
        if (!result.ok) {
          console.log(`! move refused: ${result.violation.reason}`);
        }
        break;
      }
      case 'replay':
        if (!session.requestReplay()) {
          console.log('! no match to replay yet');
        }
        break;
      case 'quit':
        shutdown();
        break;
      case 'unknown':
        console.log(COMMAND_HELP);
        break;
    }
  });

  input.on('close', shutdown);

  process.on('SIGINT', () => {
    logger.info('SIGINT received, shutting down...');
    shutdown();
  });
}

main();
