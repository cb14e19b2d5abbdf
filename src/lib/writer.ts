// Persistence writer: audit rows, workout headers and activity rows
// Every append is a separate POST; nothing is deduplicated, a repeated call writes a second row.

import type { SheetPoster } from './sheet.js';
import type { Activity, Workout } from './schema.js';
import type { ActivityRow, ParsedLogAuditRow, RawLogEntry } from '../types/index.js';

export interface WorkoutWriter {
  appendAudit(row: ParsedLogAuditRow): Promise<void>;
  appendWorkoutHeader(workoutId: string, workout: Workout): Promise<void>;
  appendActivityRows(workoutId: string, date: string, activities: Activity[]): Promise<void>;
}

export function toActivityRows(workoutId: string, date: string, activities: Activity[]): ActivityRow[] {
  return activities.map(a => ({
    workout_id: workoutId,
    date,
    exercise: a.exercise,
    exercise_id: null, // exercise normalization is not done yet
    weight: a.weight,
    reps: a.reps,
    rest_sec: a.rest_sec,
    hold_sec: a.hold_sec,
    notes: a.notes,
    set_number: a.set_number
  }));
}

export class SheetWriter implements WorkoutWriter {
  constructor(private readonly sheet: SheetPoster) {}

  async appendAudit(row: ParsedLogAuditRow): Promise<void> {
    await this.sheet.post({
      action: 'append_parsed',
      timestamp: row.timestamp,
      user_id: row.user_id,
      raw_text: row.raw_text,
      parsed_json: row.parsed_json,
      status: row.status
    });
  }

  async appendWorkoutHeader(workoutId: string, workout: Workout): Promise<void> {
    await this.sheet.post({
      action: 'append_workout',
      workout_id: workoutId,
      date: workout.date,
      type: workout.type,
      duration_min: workout.duration_min,
      location: workout.location,
      session_notes: workout.session_notes
    });
  }

  async appendActivityRows(workoutId: string, date: string, activities: Activity[]): Promise<void> {
    await this.sheet.post({
      action: 'append_activities',
      rows: toActivityRows(workoutId, date, activities)
    });
  }

  /**
   * Append a raw log row the way the chat intake does (no action field).
   */
  async appendRawLog(entry: RawLogEntry, source: string): Promise<void> {
    await this.sheet.post({
      timestamp: entry.timestamp,
      user_id: entry.user_id,
      raw_text: entry.raw_text,
      source
    });
  }
}
