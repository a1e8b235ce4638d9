import { requireBotToken, validateEnv, type Env } from './config/env.js';
import { logger } from './utils/logger.js';
import { TelegramBotClient } from './clients/TelegramBotClient.js';
import { EchoBot } from './services/bot/EchoBot.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';

let env: Env;
let token: string;
try {
  env = validateEnv();
  token = requireBotToken(env);
} catch (error) {
  logger.fatal({ error }, 'Bot configuration invalid');
  process.exit(1);
}

const bot = new EchoBot(new TelegramBotClient({ token, apiUrl: env.TELEGRAM_API_URL }), {
  pollTimeoutSeconds: env.BOT_POLL_TIMEOUT_SECONDS,
  errorDelayMs: env.BOT_ERROR_DELAY_MS,
});

const running = bot.start();

const shutdownCoordinator = new ShutdownCoordinator();
shutdownCoordinator.register('echo-bot', async () => {
  bot.stop();
  await running;
}, env.BOT_ERROR_DELAY_MS + 5000);
shutdownCoordinator.installSignalHandlers();

running.catch((error: unknown) => {
  logger.fatal({ error }, 'Echo bot crashed');
  process.exit(1);
});
