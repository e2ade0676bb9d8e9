/**
 * Check the Ollama server and the models the configured bots need
 */
import { readFileSync } from 'node:fs';
import pino from 'pino';
import { z } from 'zod';
import { OllamaClient } from '../src/ollama';

const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const RESET = '\x1b[0m';

function log(message: string, color = '') {
  console.log(`${color}${message}${RESET}`);
}

// Only the parts needed here; tokens are not substituted
const PartialConfigSchema = z.object({
  bots: z.array(z.object({ id: z.string(), model: z.string(), kind: z.enum(['chat', 'vision']).default('chat') })),
  ollama: z.object({ baseUrl: z.string().url(), timeoutMs: z.number().int().positive().default(120_000) }),
});

async function main() {
  const configPath = process.env.CONFIG_PATH ?? './config/config.json';
  const config = PartialConfigSchema.parse(JSON.parse(readFileSync(configPath, 'utf-8')));
  const baseUrl = process.env.OLLAMA_BASE_URL ?? config.ollama.baseUrl;
  const client = new OllamaClient({ ...config.ollama, baseUrl }, pino({ level: 'silent' }));

  log(`Testing connection to: ${baseUrl}\n`, BLUE);

  let models: string[];
  try {
    models = await client.listModels();
  } catch (error) {
    log(`❌ Connection failed: ${error instanceof Error ? error.message : String(error)}\n`, RED);
    log('Troubleshooting:', BOLD);
    log('  1. Make sure Ollama is running: ollama serve', BLUE);
    log(`  2. Check if the URL is correct: ${baseUrl}`, BLUE);
    process.exit(1);
  }

  log(`✅ Connected, ${models.length} model(s) available\n`, GREEN);

  let missing = 0;
  for (const bot of config.bots) {
    if (!models.includes(bot.model)) {
      missing++;
      log(`  • ${bot.id}: ${bot.model} missing, run: ollama pull ${bot.model}`, YELLOW);
      continue;
    }

    if (bot.kind === 'vision') {
      log(`  • ${bot.id}: ${bot.model} available`, GREEN);
      continue;
    }

    try {
      const reply = await client.chat([{ role: 'user', content: 'Say "Hello" in one word' }], { model: bot.model });
      log(`  • ${bot.id}: ${bot.model} answered "${reply.trim().slice(0, 40)}"`, GREEN);
    } catch (error) {
      missing++;
      log(`  • ${bot.id}: ${bot.model} failed: ${error instanceof Error ? error.message : String(error)}`, RED);
    }
  }

  log('');
  process.exit(missing > 0 ? 1 : 0);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
