#!/usr/bin/env node
import { runCli } from './index';
import { logger } from './logger';

runCli(process.argv).catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({ name: err.name, err: err.message }, 'visual-discover failed.');
  process.exitCode = 1;
});
