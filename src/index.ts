import { logger } from './observability/logger.js';
import { runConversion } from './resume/orchestrator.js';

const log = logger.child({ module: 'main' });

async function main(): Promise<void> {
  const result = await runConversion();
  log.info({ ...result }, result.pdf ? 'Rendering complete' : 'Rendering complete (without PDF)');
}

main().catch((err) => {
  log.fatal({ err }, 'Rendering failed');
  process.exit(1);
});
