import { differenceInMilliseconds, isAfter, isBefore } from 'date-fns';
import type { CalendarDelta } from '@chatclock/shared';

/**
 * Split a value into a carry for the next unit up and a remainder,
 * truncating toward zero so negative deltas stay symmetric.
 */
function carry(value: number, size: number): [number, number] {
  const quotient = Math.trunc(value / size);
  return [quotient, value - quotient * size];
}

/**
 * Add calendar months in UTC, clamping the day to the target month's last day
 * (Jan 31 + 1 month = Feb 28/29). Only UTC fields are touched, so the host
 * time zone never shifts the result.
 */
export function addUtcMonths(date: Date, months: number): Date {
  const result = new Date(date.getTime());
  const day = result.getUTCDate();

  result.setUTCDate(1);
  result.setUTCMonth(result.getUTCMonth() + months);

  // Day 0 of the following month is the last day of this one
  const lastDay = new Date(result.getTime());
  lastDay.setUTCMonth(lastDay.getUTCMonth() + 1, 0);

  result.setUTCDate(Math.min(day, lastDay.getUTCDate()));
  return result;
}

/**
 * Calendar-aware difference `to - from`.
 *
 * Whole months are counted first, stepping back (or forward, for a negative
 * delta) until adding them to `from` does not overshoot `to`. Month ends
 * clamp, so Jan 31 plus one month is Feb 28. The remainder is broken into
 * days, hours, minutes and whole seconds. Days are never folded into months.
 *
 * Month boundaries are UTC calendar months.
 */
export function relativeDelta(to: Date, from: Date): CalendarDelta {
  let totalMonths =
    (to.getUTCFullYear() - from.getUTCFullYear()) * 12 + (to.getUTCMonth() - from.getUTCMonth());
  let anchor = addUtcMonths(from, totalMonths);

  if (isBefore(to, from)) {
    while (isAfter(to, anchor)) {
      totalMonths += 1;
      anchor = addUtcMonths(from, totalMonths);
    }
  } else {
    while (isBefore(to, anchor)) {
      totalMonths -= 1;
      anchor = addUtcMonths(from, totalMonths);
    }
  }

  // Sub-second remainder is floored away
  const totalSeconds = Math.floor(differenceInMilliseconds(to, anchor) / 1000);

  const [totalMinutes, seconds] = carry(totalSeconds, 60);
  const [totalHours, minutes] = carry(totalMinutes, 60);
  const [days, hours] = carry(totalHours, 24);
  const [years, months] = carry(totalMonths, 12);

  return { years, months, days, hours, minutes, seconds };
}

/**
 * Drop the sign of every field
 */
export function absoluteDelta(delta: CalendarDelta): CalendarDelta {
  return {
    years: Math.abs(delta.years),
    months: Math.abs(delta.months),
    days: Math.abs(delta.days),
    hours: Math.abs(delta.hours),
    minutes: Math.abs(delta.minutes),
    seconds: Math.abs(delta.seconds),
  };
}
