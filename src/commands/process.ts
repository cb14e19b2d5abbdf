// liftlog process command - one batch pass over new raw logs

import { FileCheckpointStore } from '../lib/checkpoint.js';
import { getLogPath, loadConfig } from '../lib/config.js';
import { ConfigError } from '../lib/errors.js';
import { createGenerator } from '../lib/llm.js';
import { createLogger } from '../lib/log.js';
import { runPipeline } from '../lib/pipeline.js';
import { recordRun } from '../lib/runs.js';
import { SheetClient } from '../lib/sheet.js';
import { openState } from '../lib/state.js';
import { SheetWriter } from '../lib/writer.js';

interface ProcessOptions {
  limit?: number;
  dryRun?: boolean;
}

export async function runProcess(options: ProcessOptions): Promise<void> {
  const config = loadConfig();
  const limit = options.limit ?? config.fetchLimit;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ConfigError(`--limit must be a positive integer, got ${options.limit}`);
  }

  const logger = createLogger({ logPath: getLogPath() });
  const state = openState();
  const sheet = new SheetClient(config.sheet);
  const generator = createGenerator(config.llm);

  logger.info(`=== liftlog process starting (limit=${limit}, model=${generator.model}, dry-run=${options.dryRun ? 'yes' : 'no'}) ===`);

  const { summary, fatal } = await runPipeline({
    source: sheet,
    counter: sheet,
    writer: new SheetWriter(sheet),
    generator,
    checkpoints: new FileCheckpointStore(state),
    logger
  }, { limit, dryRun: options.dryRun });

  if (!options.dryRun) {
    const runId = recordRun(state, summary);
    logger.info(`Run #${runId} recorded`);
  }

  if (fatal) {
    throw fatal;
  }
}
