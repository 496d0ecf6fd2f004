import 'dotenv/config';
import { createBot } from './bot/bot.js';
import { loadConfig } from './config.js';
import { recoverInterruptedSessions, startSessionCleanup } from './housekeeping/cleanup.js';
import { createRuntime } from './runtime.js';
import { createFileStore } from './storage/dataStore.js';

async function main() {
  console.log('Quill starting...');

  const config = loadConfig();
  if (!config.telegramBotToken) {
    throw new Error('Missing required environment variable: TELEGRAM_BOT_TOKEN');
  }
  console.log(`Model: ${config.defaultModel}${config.fallbackModel ? ` (fallback ${config.fallbackModel})` : ''}`);

  const store = await createFileStore(config.dataDir);
  console.log(`Data store ready at: ${store.describe()}`);

  const runtime = createRuntime(config, store);
  await recoverInterruptedSessions(runtime.registry);

  const bot = createBot({ token: config.telegramBotToken, service: runtime.service });
  const cleanup = startSessionCleanup({ config, registry: runtime.registry });

  let stopping = false;
  const stopBot = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`Received ${signal}, stopping bot...`);
    cleanup.stop();
    void bot.stop();
  };

  const onSigint = () => stopBot('SIGINT');
  const onSigterm = () => stopBot('SIGTERM');
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  try {
    await bot.start({
      onStart: (botInfo) => {
        console.log(`Bot started as @${botInfo.username}`);
      },
    });
  } finally {
    cleanup.stop();
    process.removeListener('SIGINT', onSigint);
    process.removeListener('SIGTERM', onSigterm);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
