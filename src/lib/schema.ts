// ParsedWorkout schema: the contract the model's JSON must satisfy

import { z } from 'zod';

export const WORKOUT_TYPES = ['strength', 'rehab', 'board', 'bouldering', 'lead', 'mixed', 'other'] as const;

// Optional model fields arrive as null, missing, or a value; canonical form is value|null
const nullableNumber = z.number().finite().nullish().transform(v => v ?? null);
const nullableString = z.string().nullish().transform(v => v ?? null);

export const WorkoutSchema = z.object({
  date: z.string().date('date must be a calendar date (YYYY-MM-DD)'),
  type: z.enum(WORKOUT_TYPES),
  duration_min: nullableNumber,
  location: nullableString,
  session_notes: nullableString
});

export const ActivitySchema = z.object({
  exercise: z.string().trim().min(1, 'exercise must not be empty'),
  set_number: z.number().int().positive().nullish().transform(v => v ?? null),
  weight: nullableNumber,
  reps: nullableNumber,
  rest_sec: nullableNumber,
  hold_sec: nullableNumber,
  notes: nullableString
});

export const ParsedWorkoutSchema = z.object({
  workout: WorkoutSchema,
  activities: z.array(ActivitySchema),
  status: z.literal('ok'),
  questions: z.array(z.string()).default([])
});

// A needs_review answer is stored for a human; only its questions are checked
export const ReviewSchema = z.object({
  status: z.literal('needs_review'),
  questions: z.array(z.string()).default([])
}).passthrough();

export type Workout = z.infer<typeof WorkoutSchema>;
export type Activity = z.infer<typeof ActivitySchema>;
export type WorkoutType = Workout['type'];
export type ParsedWorkout = z.infer<typeof ParsedWorkoutSchema>;
export type ReviewPayload = z.infer<typeof ReviewSchema>;
