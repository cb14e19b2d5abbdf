// Local state file: named checkpoints and run history, kept as one JSON document

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { getStatePath } from './config.js';
import { PersistenceError, errorMessage } from './errors.js';
import type { Checkpoint, RunRecord } from '../types/index.js';

export const STATE_VERSION = 1;

// Oldest runs are dropped past this many
export const MAX_RUNS = 500;

const checkpointSchema = z.object({
  last_timestamp: z.string(),
  updated_at: z.string().optional()
});

const runSchema = z.object({
  id: z.number().int().positive(),
  started_at: z.string(),
  finished_at: z.string(),
  fetched: z.number().int(),
  eligible: z.number().int(),
  skipped: z.number().int(),
  processed: z.number().int(),
  ok: z.number().int(),
  needs_review: z.number().int(),
  errors: z.number().int(),
  previous_checkpoint: z.string(),
  last_timestamp: z.string(),
  checkpoint_saved: z.boolean()
});

const stateSchema = z.object({
  version: z.literal(STATE_VERSION),
  checkpoints: z.record(checkpointSchema).default({}),
  runs: z.array(runSchema).default([])
});

export interface State {
  version: typeof STATE_VERSION;
  checkpoints: Record<string, Checkpoint>;
  runs: RunRecord[];
}

export function emptyState(): State {
  return { version: STATE_VERSION, checkpoints: {}, runs: [] };
}

export class StateFile {
  constructor(readonly path: string) {}

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Read the state. A missing file is empty state; an unreadable or
   * malformed one is a PersistenceError, never silently reset.
   */
  read(): State {
    if (!this.exists()) {
      return emptyState();
    }

    let text: string;
    try {
      text = readFileSync(this.path, 'utf-8');
    } catch (err) {
      throw new PersistenceError(`Cannot read state file ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new PersistenceError(`State file ${this.path} is not valid JSON`, { cause: err });
    }

    const parsed = stateSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PersistenceError(`State file ${this.path} is malformed: ${issue.path.join('.')}: ${issue.message}`);
    }
    return parsed.data;
  }

  /**
   * Replace the file with `state`. Written to a sibling temp file and renamed,
   * so a crash leaves either the old or the new document.
   */
  write(state: State): void {
    const tmp = `${this.path}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmp, JSON.stringify(state, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
      renameSync(tmp, this.path);
    } catch (err) {
      throw new PersistenceError(`Cannot write state file ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  update(change: (state: State) => void): State {
    const state = this.read();
    change(state);
    this.write(state);
    return state;
  }
}

/**
 * The state file named by LIFTLOG_STATE_PATH (default ~/.liftlog/state.json).
 */
export function openState(): StateFile {
  return new StateFile(getStatePath());
}

export function initState(state: StateFile = openState()): { created: boolean; path: string } {
  if (state.exists()) {
    // Rewrite to validate the existing document and normalize its layout
    state.write(state.read());
    return { created: false, path: state.path };
  }
  state.write(emptyState());
  return { created: true, path: state.path };
}
