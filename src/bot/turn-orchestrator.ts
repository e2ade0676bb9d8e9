import type { BotConfig, DeliveryConfig } from '../config';
import { type ConversationStore, createExchange, scopeKeyFor } from '../conversation-store';
import type { Logger } from '../logger';
import type { MediaHandler } from '../media';
import { type DeliveryReport, deliver } from './delivery';
import type { ModelClient, ModelResult } from './model-client';
import { resolveTrigger } from './trigger';
import type { AttachmentRef, BotIdentity, ChannelPort, InboundMessage } from './types';

export const CLARIFICATION_REPLY = 'Please attach an image for me to analyze.';
export const FETCH_FAILED_REPLY = "I couldn't fetch the image.";

export type TurnOutcome =
  | { state: 'ignored' }
  | { state: 'clarified'; report: DeliveryReport }
  | { state: 'fetch-failed'; report: DeliveryReport }
  | { state: 'delivered'; modelOk: boolean; report: DeliveryReport }
  | { state: 'failed'; error: unknown };

export interface TurnDependencies {
  bot: Pick<BotConfig, 'id' | 'kind' | 'history' | 'defaultPrompt'>;
  identity: BotIdentity;
  model: Pick<ModelClient, 'generate'>;
  store: ConversationStore;
  media: Pick<MediaHandler, 'processImage'>;
  delivery: DeliveryConfig;
  logger: Logger;
  /** Pacing delay between chunks; tests swap in a fake */
  sleep?: (ms: number) => Promise<unknown>;
}

type Generation = { kind: 'fetch-failed' } | { kind: 'model'; result: ModelResult };

/**
 * One turn per inbound event:
 * resolve trigger → fetch context → call model → record exchange → deliver.
 * Vision bots without an image answer with a clarification instead.
 */
export class TurnOrchestrator {
  constructor(private deps: TurnDependencies) {}

  async handleMessage(message: InboundMessage, channel: ChannelPort): Promise<TurnOutcome> {
    const trigger = resolveTrigger(message, this.deps.identity);
    if (!trigger.addressed) {
      return { state: 'ignored' };
    }
    return this.runTurn(trigger.promptText, trigger.imageRef, message, channel);
  }

  /**
   * Command surface: skips trigger resolution and goes straight to the model.
   */
  async handleCommand(prompt: string, message: InboundMessage, channel: ChannelPort): Promise<TurnOutcome> {
    const promptText = prompt.trim() || this.deps.bot.defaultPrompt;
    return this.runTurn(promptText, message.attachments[0], message, channel);
  }

  private async runTurn(
    promptText: string,
    imageRef: AttachmentRef | undefined,
    message: InboundMessage,
    channel: ChannelPort,
  ): Promise<TurnOutcome> {
    const { bot, logger } = this.deps;

    try {
      logger.info(
        {
          channelId: message.channelId,
          authorId: message.authorId,
          textPreview: promptText.substring(0, 120),
          hasImage: imageRef !== undefined,
        },
        'Turn start',
      );

      if (bot.kind === 'vision' && !imageRef) {
        return { state: 'clarified', report: await this.send(CLARIFICATION_REPLY, channel) };
      }

      const generation = await this.withTyping(channel, () =>
        this.generate(promptText, bot.kind === 'vision' ? imageRef : undefined, message),
      );

      if (generation.kind === 'fetch-failed') {
        return { state: 'fetch-failed', report: await this.send(FETCH_FAILED_REPLY, channel) };
      }

      const { result } = generation;
      logger.info(
        { channelId: message.channelId, ok: result.ok, responseLength: result.text.length },
        'LLM response received',
      );

      const report = await this.send(result.text, channel);
      logger.info({ channelId: message.channelId, ...report }, 'Turn delivered');
      return { state: 'delivered', modelOk: result.ok, report };
    } catch (error) {
      logger.error({ err: error, channelId: message.channelId }, 'Turn failed');
      return { state: 'failed', error };
    }
  }

  /**
   * FETCH_CONTEXT → CALL_MODEL → RECORD_EXCHANGE
   */
  private async generate(
    promptText: string,
    imageRef: AttachmentRef | undefined,
    message: InboundMessage,
  ): Promise<Generation> {
    const { bot, store, logger } = this.deps;

    let image: string | undefined;
    if (imageRef) {
      try {
        image = await this.deps.media.processImage(imageRef);
      } catch (err) {
        logger.warn({ err, url: imageRef.url }, 'Attachment fetch failed');
        return { kind: 'fetch-failed' };
      }
    }

    const scopeKey = scopeKeyFor(bot.history, message.channelId);
    const context = bot.history === 'global' && scopeKey ? store.get(scopeKey) : [];

    const result = await this.deps.model.generate(promptText, context, image);

    if (scopeKey && result.ok) {
      store.append(scopeKey, createExchange(message.authorId, promptText, result.text));
      logger.debug({ scopeKey, exchanges: store.size(scopeKey) }, 'Exchange recorded');
    }

    return { kind: 'model', result };
  }

  private send(text: string, channel: ChannelPort): Promise<DeliveryReport> {
    const { delivery, logger, sleep } = this.deps;
    return deliver(text, channel, {
      logger,
      pacingMs: delivery.pacingMs,
      maxMessageLength: delivery.maxMessageLength,
      sleep,
    });
  }

  /**
   * Hold the typing indicator while `fn` runs. Discord drops it after ~10s,
   * so it is re-sent on an interval until `fn` settles.
   */
  private async withTyping<T>(channel: ChannelPort, fn: () => Promise<T>): Promise<T> {
    const pulse = async () => {
      try {
        await channel.sendTyping();
      } catch (err) {
        this.deps.logger.debug({ err }, 'Typing indicator failed');
      }
    };

    await pulse();
    const typingInterval = setInterval(pulse, this.deps.delivery.typingIntervalMs);
    try {
      return await fn();
    } finally {
      clearInterval(typingInterval);
    }
  }
}
