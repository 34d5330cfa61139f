import { addMinutes } from 'date-fns';
import { overlaps, type TimeInterval } from './interval.js';

/** Candidate start times are spaced this far apart, starting at opening time. */
export const SLOT_STEP_MINUTES = 15;

export interface SlotGridInput {
  windowStart: Date;
  windowEnd: Date;
  durationMinutes: number;
  booked: readonly TimeInterval[];
  now: Date;
}

/**
 * Walks the grid from `windowStart` and keeps every candidate whose
 * `[start, start + duration)` fits the window, does not start before `now`
 * and overlaps no booked interval. The walk always advances one step, so
 * a candidate just after a booking is never skipped.
 */
export function generateSlots({
  windowStart,
  windowEnd,
  durationMinutes,
  booked,
  now,
}: SlotGridInput): Date[] {
  const slots: Date[] = [];

  for (
    let candidate = windowStart;
    addMinutes(candidate, durationMinutes) <= windowEnd;
    candidate = addMinutes(candidate, SLOT_STEP_MINUTES)
  ) {
    if (candidate < now) continue;

    const slot = {
      start: candidate,
      end: addMinutes(candidate, durationMinutes),
    };
    if (booked.some((interval) => overlaps(slot, interval))) continue;

    slots.push(candidate);
  }

  return slots;
}
