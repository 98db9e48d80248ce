#!/usr/bin/env node
import path from 'path';
import { env } from './config/env';
import { ConsolePrompter } from './services/console/prompter';
import { runSession } from './services/session/menu';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  const io = new ConsolePrompter();
  const filePath = path.resolve(env.EXPENSES_FILE);

  try {
    logger.debug('Starting session', { filePath });
    await runSession({ io, filePath, currencySymbol: env.CURRENCY_SYMBOL });
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    logger.debug('Fatal error detail', { stack: error instanceof Error ? error.stack : undefined });
    process.exitCode = 1;
  } finally {
    io.close();
  }
}

void main();
