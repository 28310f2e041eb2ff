/**
 * Meeting Parser
 * Turns the Days / Begin / End / Location cells into meeting slots.
 */

import { Day } from '../types.js';
import type { Meeting } from '../types.js';

const DAY_LETTERS: Record<string, Day> = {
  'M': Day.MONDAY,
  'T': Day.TUESDAY,
  'W': Day.WEDNESDAY,
  'R': Day.THURSDAY,
  'F': Day.FRIDAY,
  'S': Day.SATURDAY,
  'U': Day.SUNDAY,
};

const ARRANGED = '(ARR)';

/**
 * Expand day letters into days.
 * "M W F" -> [Monday, Wednesday, Friday]; "TR" -> [Tuesday, Thursday];
 * "(ARR)" and unknown letters yield nothing.
 */
export function parseDays(daysText: string): Day[] {
  const days: Day[] = [];

  for (const token of daysText.trim().split(/\s+/)) {
    if (token === '' || token.toUpperCase() === ARRANGED) continue;

    for (const letter of token.toUpperCase()) {
      const day = DAY_LETTERS[letter];
      if (day && !days.includes(day)) {
        days.push(day);
      }
    }
  }

  return days;
}

/**
 * Build one meeting per day, skipping duplicates already in `existing`
 */
export function parseMeetings(
  daysText: string,
  begin: string,
  end: string,
  location: string,
  existing: readonly Meeting[] = []
): Meeting[] {
  const meetings: Meeting[] = [];

  for (const day of parseDays(daysText)) {
    const duplicate = [...existing, ...meetings].some(m =>
      m.day === day && m.begin === begin && m.end === end && m.location === location
    );
    if (!duplicate) {
      meetings.push({ day, begin, end, location });
    }
  }

  return meetings;
}
