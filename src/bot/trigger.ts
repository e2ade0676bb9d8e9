import type { AttachmentRef, BotIdentity, InboundMessage } from './types';

export interface TriggerResult {
  addressed: boolean;
  promptText: string;
  imageRef?: AttachmentRef;
}

const NOT_ADDRESSED: TriggerResult = { addressed: false, promptText: '' };

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove every `<@id>` and `<@!id>` mention of the bot, then the first
 * occurrence of the wake phrase. Falls back to the default prompt when
 * nothing is left.
 */
export function extractPrompt(content: string, identity: BotIdentity): string {
  let text = content.replace(new RegExp(`<@!?${escapeRegex(identity.userId)}>`, 'g'), '');
  if (identity.wakePhrase) {
    text = text.replace(new RegExp(escapeRegex(identity.wakePhrase), 'i'), '');
  }
  text = text.trim();
  return text || identity.defaultPrompt;
}

export function resolveTrigger(message: InboundMessage, identity: BotIdentity): TriggerResult {
  if (message.isSelf || message.authorId === identity.userId) {
    return NOT_ADDRESSED;
  }

  const mentioned = message.mentionedUserIds.includes(identity.userId);
  const wakePhrase = identity.wakePhrase.toLowerCase();
  const woken = wakePhrase.length > 0 && message.content.toLowerCase().includes(wakePhrase);
  if (!mentioned && !woken) {
    return NOT_ADDRESSED;
  }

  const result: TriggerResult = {
    addressed: true,
    promptText: extractPrompt(message.content, identity),
  };
  const [firstAttachment] = message.attachments;
  if (firstAttachment) {
    result.imageRef = firstAttachment;
  }
  return result;
}
