import { Client, Events, GatewayIntentBits, type Message } from 'discord.js';
import { type BotConfig, type Config, resolveCommandName, resolveWakePhrase } from '../config';
import type { ConversationStore } from '../conversation-store';
import type { Logger } from '../logger';
import type { MediaHandler } from '../media';
import { toInboundMessage } from './discord-utils';
import { MessageRouter } from './message-router';
import type { ModelClient } from './model-client';
import { TurnOrchestrator } from './turn-orchestrator';
import type { ChannelPort } from './types';

export interface DiscordBotDeps {
  config: Config;
  bot: BotConfig;
  model: ModelClient;
  store: ConversationStore;
  media: MediaHandler;
  logger: Logger;
}

/**
 * One Discord client per bot. Messages are handed to a `MessageRouter` once
 * the client is ready and the bot's user id is known.
 */
export class DiscordBot {
  private client: Client;
  private router: MessageRouter | null = null;
  private commandName: string;

  constructor(private deps: DiscordBotDeps) {
    this.commandName = resolveCommandName(deps.bot);
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
    });

    this.client.once(Events.ClientReady, (client) => this.onReady(client));
    this.client.on(Events.MessageCreate, (message) => this.onMessage(message));
  }

  async start(): Promise<void> {
    await this.client.login(this.deps.bot.token);
  }

  async stop(): Promise<void> {
    if (this.router && this.router.inFlight > 0) {
      this.deps.logger.warn({ activeTurns: this.router.inFlight }, 'Stopping with turns still in flight');
    }
    await this.client.destroy();
    this.router = null;
  }

  private onReady(client: Client<true>): void {
    const { bot, config, logger } = this.deps;

    const orchestrator = new TurnOrchestrator({
      bot,
      identity: {
        userId: client.user.id,
        wakePhrase: resolveWakePhrase(bot),
        defaultPrompt: bot.defaultPrompt,
      },
      model: this.deps.model,
      store: this.deps.store,
      media: this.deps.media,
      delivery: config.delivery,
      logger,
    });
    this.router = new MessageRouter({
      orchestrator,
      commandPrefix: config.discord.commandPrefix,
      commandName: this.commandName,
      logger,
    });

    logger.info(
      { user: client.user.tag, guilds: client.guilds.cache.size, command: `${config.discord.commandPrefix}${this.commandName}` },
      'Connected to Discord',
    );
    for (const guild of client.guilds.cache.values()) {
      logger.info({ guild: guild.name, guildId: guild.id }, 'Guild');
    }
  }

  private onMessage(message: Message): void {
    const router = this.router;
    if (!router) return;

    const channel = message.channel;
    if (!channel.isSendable()) return;

    const port: ChannelPort = {
      send: (text) => channel.send(text),
      sendTyping: () => channel.sendTyping(),
    };
    router.route(toInboundMessage(message, this.client.user?.id), port);
  }
}
