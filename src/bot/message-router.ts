import type { Logger } from '../logger';
import { parseCommand } from './discord-utils';
import type { TurnOrchestrator, TurnOutcome } from './turn-orchestrator';
import type { ChannelPort, InboundMessage } from './types';

export interface MessageRouterDeps {
  orchestrator: Pick<TurnOrchestrator, 'handleMessage' | 'handleCommand'>;
  commandPrefix: string;
  commandName: string;
  logger: Logger;
}

/**
 * Routes each inbound message to one turn: the `!<command>` surface when the
 * message is this bot's command, trigger resolution otherwise. Turns are
 * dispatched without being awaited so a slow model call or paced delivery
 * never holds up the next event.
 */
export class MessageRouter {
  private activeTurns: Set<Promise<void>> = new Set();

  constructor(private deps: MessageRouterDeps) {}

  get inFlight(): number {
    return this.activeTurns.size;
  }

  route(message: InboundMessage, channel: ChannelPort): void {
    if (message.isSelf) return;

    const { orchestrator, commandPrefix, commandName, logger } = this.deps;
    const commandPrompt = parseCommand(message.content, commandPrefix, commandName);
    if (commandPrompt !== null) {
      logger.debug({ channelId: message.channelId, authorId: message.authorId }, 'Command received');
      this.dispatch(orchestrator.handleCommand(commandPrompt, message, channel), message.id);
      return;
    }

    this.dispatch(orchestrator.handleMessage(message, channel), message.id);
  }

  private dispatch(turn: Promise<TurnOutcome>, messageId: string): void {
    const tracked: Promise<void> = turn
      .then((outcome) => {
        if (outcome.state !== 'ignored') {
          this.deps.logger.debug({ messageId, state: outcome.state }, 'Turn finished');
        }
      })
      .catch((err) => {
        this.deps.logger.error({ err, messageId }, 'Turn dispatch failed');
      })
      .finally(() => {
        this.activeTurns.delete(tracked);
      });
    this.activeTurns.add(tracked);
  }
}
