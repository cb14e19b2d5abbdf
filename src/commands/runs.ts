// liftlog runs command

import { recentRuns } from '../lib/runs.js';
import { openState } from '../lib/state.js';

export function runRuns(limit: number = 10): void {
  const runs = recentRuns(openState(), limit);

  if (runs.length === 0) {
    console.log('No runs recorded yet. Use "liftlog process" to run the pipeline.');
    return;
  }

  console.log(`Recent ${runs.length} runs:\n`);

  for (const r of runs) {
    const checkpoint = r.checkpoint_saved ? r.last_timestamp : `${r.previous_checkpoint || '(none)'} (not advanced)`;
    console.log(`#${r.id} ${r.started_at}`);
    console.log(`  fetched ${r.fetched}, new ${r.eligible}, processed ${r.processed}`);
    console.log(`  ok ${r.ok} | needs_review ${r.needs_review} | error ${r.errors}${r.skipped ? ` | skipped ${r.skipped}` : ''}`);
    console.log(`  checkpoint: ${checkpoint}`);
    console.log('');
  }
}
