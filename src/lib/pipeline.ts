// Pipeline driver: fetch -> sort -> parse -> allocate id -> persist -> advance checkpoint
//
// Entries are handled one at a time in ascending timestamp order. A failure while
// handling an entry becomes an `error` audit row and the run moves on; the checkpoint
// advances past every entry that got an audit row and is saved once, at the end.

import type { Checkpoint, RawLogEntry, RunSummary, AuditStatus } from '../types/index.js';
import { isEligible } from './checkpoint.js';
import type { CheckpointStore } from './checkpoint.js';
import { UpstreamError, errorMessage } from './errors.js';
import type { TextGenerator } from './llm.js';
import { silentLogger } from './log.js';
import type { Logger } from './log.js';
import { parseWorkoutLog } from './parser.js';
import type { RawLogSource } from './sheet.js';
import { nextWorkoutId } from './workout-id.js';
import type { WorkoutCounter } from './workout-id.js';
import type { WorkoutWriter } from './writer.js';

export interface PipelineDeps {
  source: RawLogSource;
  counter: WorkoutCounter;
  writer: WorkoutWriter;
  generator: TextGenerator;
  checkpoints: CheckpointStore;
  logger?: Logger;
  now?: () => Date;
}

export interface PipelineOptions {
  limit: number;
  dryRun?: boolean;
}

export interface EntryOutcome {
  timestamp: string;
  status: AuditStatus;
  workoutId?: string;
  error?: string;
}

export interface RunResult {
  summary: RunSummary;
  outcomes: EntryOutcome[];
  // Set when the run could not finish cleanly; the summary is still accurate
  fatal?: Error;
}

export function sortByTimestamp(entries: RawLogEntry[]): RawLogEntry[] {
  return [...entries].sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
}

/**
 * Default date handed to the parser: the calendar date the entry was logged,
 * or today (UTC) when the timestamp does not start with one.
 */
export function defaultDateFor(timestamp: string, now: Date): string {
  const match = /^(\d{4}-\d{2}-\d{2})T/.exec(timestamp);
  return match ? match[1] : now.toISOString().slice(0, 10);
}

async function processEntry(entry: RawLogEntry, deps: PipelineDeps, logger: Logger, now: () => Date): Promise<EntryOutcome> {
  const base = { timestamp: entry.timestamp, user_id: entry.user_id, raw_text: entry.raw_text };
  let headerWritten: string | undefined;

  try {
    // The entry's own date rather than the run's: a backlog processed days later
    // still lands on the day it was logged
    const result = await parseWorkoutLog(deps.generator, entry.raw_text, defaultDateFor(entry.timestamp, now()));

    if (result.status === 'needs_review') {
      await deps.writer.appendAudit({ ...base, parsed_json: result.parsedJson, status: 'needs_review' });
      logger.info(`? ${entry.timestamp} needs review: ${result.parsed.questions.join(' | ') || '(no questions)'}`);
      return { timestamp: entry.timestamp, status: 'needs_review' };
    }

    const { workout, activities } = result.parsed;
    const workoutId = await nextWorkoutId(deps.counter, workout.date);
    await deps.writer.appendWorkoutHeader(workoutId, workout);
    headerWritten = workoutId;
    await deps.writer.appendActivityRows(workoutId, workout.date, activities);
    await deps.writer.appendAudit({ ...base, parsed_json: result.parsedJson, status: 'ok' });

    logger.info(`✓ ${entry.timestamp} ${workoutId} ${workout.type} (${activities.length} activities)`);
    return { timestamp: entry.timestamp, status: 'ok', workoutId };
  } catch (err) {
    const message = errorMessage(err);
    if (headerWritten) {
      logger.warn(`Partial write for ${entry.timestamp}: header ${headerWritten} exists but the entry failed afterwards`);
    }

    try {
      await deps.writer.appendAudit({ ...base, parsed_json: JSON.stringify({ error: message }), status: 'error' });
    } catch (auditErr) {
      throw new UpstreamError(`Could not record failure of entry ${entry.timestamp} (${message}): ${errorMessage(auditErr)}`, { cause: auditErr });
    }

    logger.warn(`✗ ${entry.timestamp} error: ${message}`);
    return { timestamp: entry.timestamp, status: 'error', error: message };
  }
}

export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<RunResult> {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();

  const checkpoint: Checkpoint = deps.checkpoints.load();
  logger.info(`Checkpoint: ${checkpoint.last_timestamp || '(none, processing everything)'}`);

  const entries = await deps.source.fetchRawLogs(options.limit);
  const sorted = sortByTimestamp(entries);

  const skipped = sorted.filter(e => e.timestamp === '');
  for (const e of skipped) {
    logger.warn(`Skipping raw row without timestamp: ${e.raw_text.slice(0, 60)}`);
  }
  const eligible = sorted.filter(e => isEligible(e.timestamp, checkpoint));
  logger.info(`Fetched ${entries.length} raw rows, ${eligible.length} new`);

  const summary: RunSummary = {
    started_at: startedAt,
    finished_at: startedAt,
    fetched: entries.length,
    eligible: eligible.length,
    skipped: skipped.length,
    processed: 0,
    ok: 0,
    needs_review: 0,
    errors: 0,
    previous_checkpoint: checkpoint.last_timestamp,
    last_timestamp: checkpoint.last_timestamp,
    checkpoint_saved: false
  };
  const outcomes: EntryOutcome[] = [];

  if (options.dryRun) {
    for (const e of eligible) {
      logger.info(`[DRY RUN] would process ${e.timestamp} (${e.user_id}): ${e.raw_text.slice(0, 80)}`);
    }
    summary.finished_at = now().toISOString();
    return { summary, outcomes };
  }

  let fatal: Error | undefined;

  for (const entry of eligible) {
    let outcome: EntryOutcome;
    try {
      outcome = await processEntry(entry, deps, logger, now);
    } catch (err) {
      // The entry has no audit row, so the checkpoint must stay before it
      fatal = err instanceof Error ? err : new Error(String(err));
      logger.error(fatal.message);
      break;
    }

    outcomes.push(outcome);
    summary.processed++;
    if (outcome.status === 'ok') summary.ok++;
    else if (outcome.status === 'needs_review') summary.needs_review++;
    else summary.errors++;
    summary.last_timestamp = entry.timestamp;
  }

  if (summary.processed > 0) {
    try {
      deps.checkpoints.save({ last_timestamp: summary.last_timestamp });
      summary.checkpoint_saved = true;
    } catch (err) {
      // Already-written rows stay; the next run reprocesses this window
      const saveError = err instanceof Error ? err : new Error(String(err));
      logger.error(`${saveError.message} - the next run will reprocess from ${checkpoint.last_timestamp || 'the beginning'}`);
      fatal = fatal ?? saveError;
    }
    logger.info(`Done. Processed ${summary.processed} (ok ${summary.ok}, needs_review ${summary.needs_review}, error ${summary.errors}). Last processed timestamp: ${summary.last_timestamp}`);
  } else if (!fatal) {
    logger.info('Nothing new to process.');
  }

  summary.finished_at = now().toISOString();
  return { summary, outcomes, fatal };
}
