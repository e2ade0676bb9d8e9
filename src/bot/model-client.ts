import type { Exchange } from '../conversation-store';
import type { Logger } from '../logger';
import type { ChatMessage, OllamaClient } from '../ollama';

export const CHAT_FALLBACK = "I'm sorry, but I couldn't process that.";
export const VISION_FALLBACK = "I'm sorry, I couldn't process the image.";

export interface ModelResult {
  ok: boolean;
  text: string;
}

export type ModelBackend = Pick<OllamaClient, 'chat' | 'generate'>;

export interface ModelSettings {
  model: string;
  systemPrompt: string;
}

/**
 * Persona first, then each prior exchange as a user/assistant pair, then the new prompt.
 */
export function buildChatMessages(
  systemPrompt: string,
  context: readonly Exchange[],
  prompt: string,
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }];
  for (const exchange of context) {
    messages.push({ role: 'user', content: exchange.promptText });
    messages.push({ role: 'assistant', content: exchange.responseText });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

export class ModelClient {
  constructor(
    private backend: ModelBackend,
    private settings: ModelSettings,
    private logger: Logger,
  ) {}

  /**
   * Never throws: any failure is logged and answered with a fixed fallback.
   * With an image the call is single-shot and `context` is ignored.
   */
  async generate(prompt: string, context: readonly Exchange[], image?: string): Promise<ModelResult> {
    const { model } = this.settings;

    if (image !== undefined) {
      try {
        const text = await this.backend.generate(prompt, { model, images: [image] });
        return { ok: true, text };
      } catch (error) {
        this.logger.error({ err: error, model }, 'Image generation failed');
        return { ok: false, text: VISION_FALLBACK };
      }
    }

    const messages = buildChatMessages(this.settings.systemPrompt, context, prompt);
    try {
      this.logger.info(
        { model, historyLength: context.length, promptToLLM: prompt.substring(0, 200) },
        'Sending to LLM',
      );
      const text = await this.backend.chat(messages, { model });
      return { ok: true, text };
    } catch (error) {
      this.logger.error({ err: error, model }, 'Chat generation failed');
      return { ok: false, text: CHAT_FALLBACK };
    }
  }
}
