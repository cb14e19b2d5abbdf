// Workout ID allocation: YYYYMMDD-SSS with a per-date serial
//
// The serial is read-then-used (count of existing workouts for the date + 1), not an
// atomic counter in the store. Two overlapping runs allocating for the same date can
// hand out the same serial; runs must not overlap.

import { z } from 'zod';

const calendarDate = z.string().date();

export interface WorkoutCounter {
  countWorkoutsForDate(date: string): Promise<number>;
}

export function formatWorkoutId(date: string, serial: number): string {
  if (!calendarDate.safeParse(date).success) {
    throw new RangeError(`Invalid workout date "${date}" (expected YYYY-MM-DD)`);
  }
  if (!Number.isInteger(serial) || serial < 1) {
    throw new RangeError(`Invalid workout serial ${serial}`);
  }
  return `${date.replaceAll('-', '')}-${String(serial).padStart(3, '0')}`;
}

export async function nextWorkoutId(counter: WorkoutCounter, date: string): Promise<string> {
  const count = await counter.countWorkoutsForDate(date);
  return formatWorkoutId(date, count + 1);
}
