import { loadEnv } from './config/env.js';
import { ChatBot } from './bot/chatBot.js';

async function main(): Promise<void> {
  const config = loadEnv();
  installProcessGuards();
  const bot = new ChatBot(config);
  installShutdown(bot);
  await bot.start();
}

main().catch((err) => {
  console.error('Bot crashed:', err);
  process.exit(1);
});

function installProcessGuards(): void {
  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled promise rejection:', reason);
    process.exit(1);
  });

  process.on('uncaughtException', (err) => {
    console.error('Uncaught exception:', err);
    process.exit(1);
  });
}

function installShutdown(bot: ChatBot): void {
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down.`);
    bot.stop();
    process.exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
