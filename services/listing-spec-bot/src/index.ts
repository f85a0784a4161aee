import TelegramBot from 'node-telegram-bot-api';
import { config, validateConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { createProviders, createTextChain, createVisionChain } from './providers/index.js';
import { TzValidator } from './core/validator.js';
import { TzGenerator } from './core/generator.js';
import { TzBot } from './bot.js';

const logger = createLogger({ module: 'main' });

async function main() {
  logger.info('Starting listing-spec-bot...');

  validateConfig(config);

  // 1. AI провайдеры и цепочки (один раз на процесс)
  const providers = createProviders(config);
  const visionChain = createVisionChain(providers, config);
  const textChain = createTextChain(providers, config);
  logger.info({ providers: providers.map(p => p.name), chain: config.chain }, 'Provider chains ready');

  const generator = new TzGenerator({
    visionChain,
    textChain,
    validator: new TzValidator(config.generation.minTzLength),
  });

  // 2. Telegram бот (polling)
  const telegram = new TelegramBot(config.telegram.botToken, { polling: true });
  const me = await telegram.getMe();
  logger.info({ username: me.username, id: me.id }, 'Bot connected');

  const bot = new TzBot({ bot: telegram, generator, maxPhotos: config.generation.maxPhotos });
  bot.start();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    try {
      await bot.stop();
    } catch (err: unknown) {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Error during shutdown');
    }
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  logger.info('listing-spec-bot is ready');
}

main().catch((err: unknown) => {
  logger.fatal(
    { error: err instanceof Error ? err.message : String(err), stack: err instanceof Error ? err.stack : undefined },
    'Failed to start'
  );
  process.exit(1);
});
