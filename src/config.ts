import { readFileSync } from 'node:fs';
import { z } from 'zod';

// Zod schemas for type-safe configuration
const BotConfigSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    token: z.string().min(1),
    enabled: z.boolean().default(true),
    kind: z.enum(['chat', 'vision']).default('chat'),
    model: z.string().min(1),
    systemPrompt: z.string().default('You are a helpful assistant.'),
    history: z.enum(['global', 'channel', 'none']).default('none'),
    wakePhrase: z.string().min(1).optional(), // defaults to "hello <name>"
    defaultPrompt: z.string().min(1).default('Hello'),
    command: z.string().min(1).optional(), // defaults to the bot id
  })
  .refine((bot) => bot.kind === 'chat' || bot.history === 'none', {
    message: 'Vision bots are single-shot and cannot keep history',
    path: ['history'],
  });

const OllamaConfigSchema = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive().default(120_000),
});

const DiscordConfigSchema = z
  .object({
    commandPrefix: z.string().min(1).default('!'),
  })
  .default({});

export const DeliveryConfigSchema = z
  .object({
    maxMessageLength: z.number().int().positive().max(2000).default(2000),
    pacingMs: z.number().int().min(0).default(15_000),
    typingIntervalMs: z.number().int().positive().default(8000),
  })
  .default({});

export const ConversationConfigSchema = z
  .object({
    maxExchanges: z.number().int().positive().default(50),
  })
  .default({});

const MediaConfigSchema = z
  .object({
    maxFileSizeMb: z.number().positive().default(10),
    downloadTimeoutMs: z.number().int().positive().default(30_000),
  })
  .default({});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  bots: z.array(BotConfigSchema).min(1),
  ollama: OllamaConfigSchema,
  discord: DiscordConfigSchema,
  delivery: DeliveryConfigSchema,
  conversation: ConversationConfigSchema,
  media: MediaConfigSchema,
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type BotConfig = z.infer<typeof BotConfigSchema>;
export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type DiscordConfig = z.infer<typeof DiscordConfigSchema>;
export type DeliveryConfig = z.infer<typeof DeliveryConfigSchema>;
export type ConversationConfig = z.infer<typeof ConversationConfigSchema>;
export type MediaConfig = z.infer<typeof MediaConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Substitute environment variables in strings
 * Supports ${VAR_NAME} syntax
 */
export function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = env[varName];
      if (value === undefined || value === '') {
        throw new ConfigError(`Environment variable ${varName} is not defined`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

/**
 * Validate a raw (already parsed) configuration object
 */
export function parseConfig(rawConfig: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const configWithEnv = substituteEnvVars(rawConfig, env);
  const result = ConfigSchema.safeParse(configWithEnv);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  const ids = new Set<string>();
  for (const bot of result.data.bots) {
    if (ids.has(bot.id)) {
      throw new ConfigError(`Duplicate bot id: ${bot.id}`);
    }
    ids.add(bot.id);
  }

  return result.data;
}

/**
 * Load and validate configuration from file
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Config {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read configuration at ${configPath}: ${reason}`);
  }
  return parseConfig(rawConfig, env);
}

export function resolveWakePhrase(bot: BotConfig): string {
  return (bot.wakePhrase ?? `hello ${bot.name}`).toLowerCase();
}

export function resolveCommandName(bot: BotConfig): string {
  return (bot.command ?? bot.id).toLowerCase();
}
