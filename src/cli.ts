#!/usr/bin/env node
import { loadConfig } from './lib/config';
import { runFlarePipeline } from './lib/pipeline';
import { formatReport } from './lib/pipeline/06-report';

async function bootstrap() {
  const config = loadConfig();
  const report = await runFlarePipeline(config);
  console.log(formatReport(report).join('\n'));
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? `${error.name}: ${error.message}` : error);
  process.exit(1);
});
