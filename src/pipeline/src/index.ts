import { createLogger, env } from '@review-lens/shared';
import { runCli } from './cli.js';
import { createDatasetSource } from './source.js';

const logger = createLogger('ReviewLensMain');

async function main() {
  await runCli(env, createDatasetSource(env));
  await logger.flush();
}

main().catch(async (error) => {
  logger.fatal('Review dashboard failed', error);
  await logger.flush();
  process.exit(1);
});
