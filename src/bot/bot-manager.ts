import type { BotConfig, Config } from '../config';
import { ConversationStore } from '../conversation-store';
import { type Logger, createBotLogger } from '../logger';
import { MediaHandler } from '../media';
import type { OllamaClient } from '../ollama';
import { DiscordBot } from './discord-bot';
import { ModelClient } from './model-client';

export class BotManager {
  private bots: Map<string, DiscordBot> = new Map();
  private mediaHandler: MediaHandler;

  constructor(
    private config: Config,
    private ollamaClient: OllamaClient,
    private logger: Logger,
  ) {
    this.mediaHandler = new MediaHandler(config.media, logger);
  }

  async startBot(botConfig: BotConfig): Promise<void> {
    if (this.bots.has(botConfig.id)) {
      this.logger.warn({ botId: botConfig.id }, 'Bot already running');
      return;
    }

    const botLogger = createBotLogger(this.logger, botConfig.id);
    // Each bot owns its history; nothing is shared between personas
    const store = new ConversationStore(this.config.conversation);
    const model = new ModelClient(
      this.ollamaClient,
      { model: botConfig.model, systemPrompt: botConfig.systemPrompt },
      botLogger,
    );

    const bot = new DiscordBot({
      config: this.config,
      bot: botConfig,
      model,
      store,
      media: this.mediaHandler,
      logger: botLogger,
    });

    await bot.start();
    this.bots.set(botConfig.id, bot);
    botLogger.info({ name: botConfig.name, kind: botConfig.kind, model: botConfig.model }, 'Bot started');
  }

  async startAll(): Promise<void> {
    for (const botConfig of this.config.bots.filter((b) => b.enabled)) {
      await this.startBot(botConfig);
    }
  }

  async stopAll(): Promise<void> {
    for (const [botId, bot] of this.bots) {
      await bot.stop();
      this.logger.info({ botId }, 'Bot stopped');
    }
    this.bots.clear();
  }
}
