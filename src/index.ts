import 'dotenv/config';
import { BotManager } from './bot/bot-manager';
import { type Config, ConfigError, loadConfig } from './config';
import { createLogger } from './logger';
import { OllamaClient } from './ollama';

async function main(): Promise<void> {
  const configPath = process.env.CONFIG_PATH ?? './config/config.json';

  let config: Config;
  try {
    config = loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger(config.logging);
  logger.info({ platform: process.platform, node: process.version }, 'Starting Ollama Discord bots');

  const ollamaClient = new OllamaClient(config.ollama, logger);
  try {
    const models = await ollamaClient.listModels();
    const missing = config.bots.filter((b) => b.enabled && !models.includes(b.model)).map((b) => b.model);
    if (missing.length > 0) {
      logger.warn({ missing }, 'Configured models are not pulled on the Ollama server');
    } else {
      logger.info({ baseUrl: config.ollama.baseUrl, models: models.length }, 'Ollama reachable');
    }
  } catch (err) {
    // Turns answer with the fallback reply until Ollama comes back
    logger.warn({ err, baseUrl: config.ollama.baseUrl }, 'Ollama not reachable at startup');
  }

  const botManager = new BotManager(config, ollamaClient, logger);
  try {
    await botManager.startAll();
  } catch (err) {
    logger.fatal({ err }, 'Failed to start bots');
    await botManager.stopAll();
    process.exit(1);
  }

  logger.info('All bots operational');

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, 'Shutting down...');
    await botManager.stopAll();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
