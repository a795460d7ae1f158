import readline from 'readline';
import { v4 as uuidv4 } from 'uuid';
import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

/**
 * Console front end: one line in, one routed reply out.
 * USER_ID and SESSION_ID may be set to resume a known conversation.
 */
async function main(): Promise<void> {
  const app = await buildApp();
  const userId = process.env.USER_ID || 'console-user';
  const sessionId = process.env.SESSION_ID || uuidv4();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

  // Graceful shutdown
  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, 'Shutting down...');
    rl.close();
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });

  logger.info({ env: env.nodeEnv, userId, sessionId }, 'Support router ready');
  rl.prompt();

  rl.on('line', (line) => {
    rl.pause();
    app.orchestrator
      .processMessage(userId, sessionId, line)
      .then((response) => {
        process.stdout.write(`${response.responseText}\n`);
        if (response.sources.length > 0) {
          for (const source of response.sources) {
            process.stdout.write(`  - ${source.title} (${source.link})\n`);
          }
        }
      })
      .catch((err) => logger.error({ err }, 'Unexpected failure handling input'))
      .finally(() => {
        rl.resume();
        rl.prompt();
      });
  });

  rl.on('close', () => {
    shutdown('stdin closed').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
