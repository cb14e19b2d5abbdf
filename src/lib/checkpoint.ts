// Durable checkpoint: timestamp of the last handled raw log entry

import { z } from 'zod';
import type { Checkpoint } from '../types/index.js';
import { ConfigError, PersistenceError, errorMessage } from './errors.js';
import type { StateFile } from './state.js';

export const EMPTY_CHECKPOINT: Checkpoint = { last_timestamp: '' };

export interface CheckpointStore {
  load(): Checkpoint;
  save(checkpoint: Checkpoint): void;
}

const DEFAULT_NAME = 'raw_logs';

export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly state: StateFile, private readonly name: string = DEFAULT_NAME) {}

  load(): Checkpoint {
    return this.state.read().checkpoints[this.name] ?? { ...EMPTY_CHECKPOINT };
  }

  save(checkpoint: Checkpoint): void {
    try {
      this.state.update(s => {
        s.checkpoints[this.name] = {
          last_timestamp: checkpoint.last_timestamp,
          updated_at: new Date().toISOString()
        };
      });
    } catch (err) {
      throw new PersistenceError(`Failed to save checkpoint "${checkpoint.last_timestamp}": ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * An entry is eligible iff its timestamp sorts strictly after the checkpoint.
 * ISO-8601 UTC timestamps compare chronologically as plain strings.
 */
export function isEligible(timestamp: string, checkpoint: Checkpoint): boolean {
  return timestamp !== '' && timestamp > checkpoint.last_timestamp;
}

// Only UTC timestamps in the raw-log format order correctly against raw entries
const checkpointTimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'must be an ISO-8601 timestamp such as 2026-03-05T18:00:00+00:00' })
  .refine(ts => ts.endsWith('Z') || ts.endsWith('+00:00'), 'must be in UTC (Z or +00:00)');

/**
 * Validate a timestamp given by hand before it becomes the checkpoint.
 */
export function parseCheckpointTimestamp(input: string): string {
  const parsed = checkpointTimestampSchema.safeParse(input.trim());
  if (!parsed.success) {
    throw new ConfigError(`Invalid checkpoint "${input}": ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}
