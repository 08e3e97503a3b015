import { runCli } from './app';
import { ExitCode } from './errors/exit-codes';
import { logger } from './utils/logger';

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(ExitCode.INTERNAL);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${reason}`);
  process.exit(ExitCode.INTERNAL);
});

await runCli(process.argv.slice(2));
