// Run history: one record per pipeline pass, newest last in the state file

import type { RunRecord, RunSummary } from '../types/index.js';
import { MAX_RUNS } from './state.js';
import type { StateFile } from './state.js';

export function recordRun(state: StateFile, summary: RunSummary): number {
  let id = 0;
  state.update(s => {
    id = (s.runs.length > 0 ? s.runs[s.runs.length - 1].id : 0) + 1;
    s.runs.push({ id, ...summary });
    if (s.runs.length > MAX_RUNS) {
      s.runs.splice(0, s.runs.length - MAX_RUNS);
    }
  });
  return id;
}

export function recentRuns(state: StateFile, limit: number = 10): RunRecord[] {
  if (limit < 1) return [];
  return state.read().runs.slice(-limit).reverse();
}
