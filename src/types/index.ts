// Core types for liftlog

export interface RawLogEntry {
  timestamp: string;
  user_id: string;
  raw_text: string;
}

export interface Checkpoint {
  last_timestamp: string;
  updated_at?: string;
}

export type ParseStatus = 'ok' | 'needs_review';
export type AuditStatus = ParseStatus | 'error';

export interface ParsedLogAuditRow {
  timestamp: string;
  user_id: string;
  raw_text: string;
  parsed_json: string;
  status: AuditStatus;
}

// Row shape of the store's activities sheet
export interface ActivityRow {
  workout_id: string;
  date: string;
  exercise: string;
  exercise_id: string | null;
  weight: number | null;
  reps: number | null;
  rest_sec: number | null;
  hold_sec: number | null;
  notes: string | null;
  set_number: number | null;
}

export interface RunSummary {
  started_at: string;
  finished_at: string;
  fetched: number;
  eligible: number;
  skipped: number;
  processed: number;
  ok: number;
  needs_review: number;
  errors: number;
  previous_checkpoint: string;
  last_timestamp: string;
  checkpoint_saved: boolean;
}

export interface RunRecord extends RunSummary {
  id: number;
}
