#!/usr/bin/env node
import 'dotenv/config';
import { CommanderError } from 'commander';
import { buildProgram, CONFIG_ERROR_EXIT_CODE } from './cli';
import { loadConfig } from './config';
import type { AppConfig } from './types';
import { isArchiveError, logger } from './utils';

const shutdownHandlers = new Set<() => void>();

function onShutdown(handler: () => void): () => void {
  shutdownHandlers.add(handler);
  return () => shutdownHandlers.delete(handler);
}

function shutdown(signal: string): void {
  if (shutdownHandlers.size === 0) {
    process.exit(130);
  }
  logger.info('System', `Received ${signal}, finishing in-flight downloads...`);
  for (const handler of shutdownHandlers) {
    handler();
  }
  shutdownHandlers.clear();
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (isArchiveError(error)) {
      logger.error('System', `Invalid configuration: ${error.message}`, error.toJSON());
      process.exit(CONFIG_ERROR_EXIT_CODE);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();
  logger.setLevel(config.app.logLevel);

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const program = buildProgram({
    config,
    onShutdown,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      const helpOrVersion = error.code === 'commander.helpDisplayed' || error.code === 'commander.version';
      process.exitCode = helpOrVersion ? 0 : CONFIG_ERROR_EXIT_CODE;
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  logger.error('System', 'Fatal error', {
    error: error instanceof Error ? error.message : 'Unknown',
  });
  process.exit(1);
});
