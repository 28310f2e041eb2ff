import { parseDays, parseMeetings } from '../parsers/meetingParser.js';
import { Day } from '../types.js';

describe('parseDays', () => {
  test('spaced letters', () => {
    expect(parseDays('M W F')).toEqual([Day.MONDAY, Day.WEDNESDAY, Day.FRIDAY]);
  });

  test('R is Thursday and U is Sunday', () => {
    expect(parseDays('TR')).toEqual([Day.TUESDAY, Day.THURSDAY]);
    expect(parseDays('S U')).toEqual([Day.SATURDAY, Day.SUNDAY]);
  });

  test('arranged, blank and unknown text give no days', () => {
    expect(parseDays('(ARR)')).toEqual([]);
    expect(parseDays('')).toEqual([]);
    expect(parseDays('X')).toEqual([]);
  });

  test('repeated letters collapse', () => {
    expect(parseDays('M M')).toEqual([Day.MONDAY]);
  });
});

describe('parseMeetings', () => {
  test('one meeting per day', () => {
    expect(parseMeetings('T R', '9:30AM', '10:45AM', 'WMS 220')).toEqual([
      { day: Day.TUESDAY, begin: '9:30AM', end: '10:45AM', location: 'WMS 220' },
      { day: Day.THURSDAY, begin: '9:30AM', end: '10:45AM', location: 'WMS 220' },
    ]);
  });

  test('skips meetings already present', () => {
    const existing = [{ day: Day.TUESDAY, begin: '9:30AM', end: '10:45AM', location: 'WMS 220' }];
    expect(parseMeetings('T W', '9:30AM', '10:45AM', 'WMS 220', existing)).toEqual([
      { day: Day.WEDNESDAY, begin: '9:30AM', end: '10:45AM', location: 'WMS 220' },
    ]);
  });
});
