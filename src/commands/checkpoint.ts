// liftlog checkpoint commands

import { FileCheckpointStore, parseCheckpointTimestamp } from '../lib/checkpoint.js';
import { openState } from '../lib/state.js';

function store(): FileCheckpointStore {
  return new FileCheckpointStore(openState());
}

export function runCheckpointShow(): void {
  const checkpoint = store().load();

  if (!checkpoint.last_timestamp) {
    console.log('No checkpoint yet. The next run processes every raw log.');
    return;
  }

  console.log(`Last processed: ${checkpoint.last_timestamp}`);
  if (checkpoint.updated_at) {
    console.log(`Saved at:       ${checkpoint.updated_at}`);
  }
}

export function runCheckpointSet(timestamp: string): void {
  const checkpoint = parseCheckpointTimestamp(timestamp);
  store().save({ last_timestamp: checkpoint });
  console.log(`✓ Checkpoint set to ${checkpoint}`);
}

export function runCheckpointReset(): void {
  store().save({ last_timestamp: '' });
  console.log('✓ Checkpoint cleared. The next run reprocesses every raw log it fetches.');
}
