import { InvalidParameterError, ParseError } from '../errors.js';
import {
  cleanTitle,
  mapModality,
  mapSectionType,
  parseCount,
  parseSearchPage,
  parseSearchResults,
} from '../parsers/courseParser.js';
import { Day, Modality, SectionType, Semester } from '../types.js';
import { loadFixture } from './helpers.js';

const HEADER = `
  <tr><td>CRN</td><td>Course</td><td>Title</td><td>Capacity</td></tr>`;

function page(rows: string): string {
  return `<html><body><table>${HEADER}${rows}</table></body></html>`;
}

describe('parseSearchResults', () => {
  const courses = parseSearchResults(loadFixture('search-results.html'), '2024', Semester.FALL);

  test('returns one course per section row, in page order', () => {
    expect(courses.map(c => c.crn)).toEqual(['83075', '83080', '83091', '83102']);
  });

  test('decodes every field of a full row', () => {
    const [linearAlgebra] = courses;
    expect(linearAlgebra.year).toBe('2024');
    expect(linearAlgebra.semester).toBe(Semester.FALL);
    expect(linearAlgebra.subject).toBe('MATH');
    expect(linearAlgebra.code).toBe('2114');
    expect(linearAlgebra.courseId).toBe('MATH-2114');
    expect(linearAlgebra.section).toBeNull();
    expect(linearAlgebra.title).toBe('Introduction to Linear Algebra');
    expect(linearAlgebra.sectionType).toBe(SectionType.LECTURE);
    expect(linearAlgebra.modality).toBe(Modality.IN_PERSON);
    expect(linearAlgebra.creditHours).toBe('3');
    expect(linearAlgebra.capacity).toBe(30);
    expect(linearAlgebra.enrolled).toBe(30);
    expect(linearAlgebra.waitlist).toBe(2);
    expect(linearAlgebra.instructor).toBe('J Smith');
    expect(linearAlgebra.location).toBe('MCB 100');
    expect(linearAlgebra.examCode).toBe('09M');
    expect(linearAlgebra.meetings).toEqual([
      { day: Day.MONDAY, begin: '10:10AM', end: '11:00AM', location: 'MCB 100' },
      { day: Day.WEDNESDAY, begin: '10:10AM', end: '11:00AM', location: 'MCB 100' },
      { day: Day.FRIDAY, begin: '10:10AM', end: '11:00AM', location: 'MCB 100' },
    ]);
  });

  test('a full section has no open spots', () => {
    expect(courses[0].hasOpenSpots()).toBe(false);
    expect(courses[1].hasOpenSpots()).toBe(true);
    expect(courses[3].hasOpenSpots()).toBe(true);
  });

  test('folds additional-times rows into the preceding section', () => {
    const hybrid = courses[1];
    expect(hybrid.modality).toBe(Modality.HYBRID);
    expect(hybrid.meetings).toEqual([
      { day: Day.TUESDAY, begin: '2:00PM', end: '3:15PM', location: 'GOODW 190' },
      { day: Day.THURSDAY, begin: '2:00PM', end: '3:15PM', location: 'GOODW 190' },
      { day: Day.FRIDAY, begin: '1:25PM', end: '2:15PM', location: 'TORG 1030' },
    ]);
    expect(hybrid.location).toBe('GOODW 190');
  });

  test('blank and non-numeric counts become the unknown sentinel', () => {
    const online = courses[2];
    expect(online.capacity).toBeNull();
    expect(online.enrolled).toBeNull();
    expect(online.waitlist).toBeNull();
    expect(online.seatsRemaining()).toBeNull();
    expect(online.hasOpenSpots()).toBe(false);
    expect(courses[3].waitlist).toBeNull();
  });

  test('arranged sections have no meetings', () => {
    const online = courses[2];
    expect(online.sectionType).toBe(SectionType.LAB);
    expect(online.modality).toBe(Modality.ONLINE_ASYNC);
    expect(online.meetings).toEqual([]);
    expect(online.location).toBe('ONLINE');
  });

  test('compact day letters expand', () => {
    expect(courses[3].meetings.map(m => m.day)).toEqual([Day.TUESDAY, Day.THURSDAY]);
    expect(courses[3].modality).toBe(Modality.ONLINE_SYNC);
    expect(courses[3].sectionType).toBe(SectionType.RECITATION);
  });

  test('parsed courses are frozen', () => {
    expect(Object.isFrozen(courses[0])).toBe(true);
    expect(Object.isFrozen(courses[0].meetings)).toBe(true);
  });

  test('a no-results page yields an empty list', () => {
    expect(parseSearchResults(loadFixture('no-results.html'), '2024', Semester.FALL)).toEqual([]);
  });

  test('a header row with no sections yields an empty list', () => {
    expect(parseSearchResults(page(''), '2024', Semester.FALL)).toEqual([]);
  });

  test('a page without the results table is a ParseError', () => {
    expect(() => parseSearchResults(loadFixture('maintenance.html'), '2024', Semester.FALL)).toThrow(ParseError);
    expect(() => parseSearchResults('', '2024', Semester.FALL)).toThrow(
      'Results table not found (no header row with a CRN column)'
    );
  });

  test('the remote problem banner becomes InvalidParameterError with its message', () => {
    expect(() => parseSearchResults(loadFixture('search-problem.html'), '2024', Semester.FALL)).toThrow(
      new InvalidParameterError('search', 'Course number 21X is not valid.')
    );
  });

  test('the remote error banner becomes InvalidParameterError', () => {
    expect(() => parseSearchResults(loadFixture('request-error.html'), '2024', Semester.FALL)).toThrow(
      'The timetable rejected the search parameters'
    );
  });

  test('one undecodable row fails the whole page', () => {
    const html = page(`
      <tr><td>83075</td><td>MATH-2114</td><td>Linear Algebra</td><td>30</td></tr>
      <tr><td>83O80</td><td>MATH-2114</td><td>Linear Algebra</td><td>30</td></tr>`);
    expect(() => parseSearchResults(html, '2024', Semester.FALL)).toThrow(
      'Row 2: CRN cell "83O80" is not a five-digit number'
    );
  });

  test('a course cell without SUBJECT-NUMBER fails the page', () => {
    const html = page('<tr><td>83075</td><td>MATH 2114</td><td>Linear Algebra</td><td>30</td></tr>');
    expect(() => parseSearchResults(html, '2024', Semester.FALL)).toThrow(ParseError);
  });

  test('an additional-times row with nothing before it fails the page', () => {
    const html = page('<tr><td colspan="2">* Additional Times *</td><td></td><td></td></tr>');
    expect(() => parseSearchResults(html, '2024', Semester.FALL)).toThrow(
      'Row 1: additional times row has no preceding course'
    );
  });

  test('missing optional columns decode as blanks', () => {
    const [course] = parseSearchResults(
      page('<tr><td>12345</td><td>ENGL-1105</td><td>First-Year Writing</td><td>22</td></tr>'),
      '2025',
      Semester.SPRING
    );
    expect(course.capacity).toBe(22);
    expect(course.enrolled).toBeNull();
    expect(course.modality).toBe(Modality.UNSPECIFIED);
    expect(course.sectionType).toBe(SectionType.UNSPECIFIED);
    expect(course.instructor).toBe('');
    expect(course.meetings).toEqual([]);
  });

  test('a Seats column is not taken for capacity', () => {
    const html = `<table>
      <tr><th>CRN</th><th>Course</th><th>Seats</th></tr>
      <tr><td>12345</td><td>ENGL-1105</td><td>4</td></tr>
    </table>`;
    expect(parseSearchResults(html, '2025', Semester.SPRING)[0].capacity).toBeNull();
  });

  test('reports whether the table has a Section column', () => {
    expect(parseSearchPage(loadFixture('live-crn.html'), '2024', Semester.FALL).hasSectionColumn).toBe(false);
  });

  test('reads a section column when the page has one', () => {
    const html = `<table>
      <tr><th>CRN</th><th>Course</th><th>Section</th></tr>
      <tr><td>12345</td><td>ENGL-1105</td><td>7</td></tr>
    </table>`;
    expect(parseSearchResults(html, '2025', Semester.SPRING)[0].section).toBe('7');
  });
});

describe('cell mappers', () => {
  test('mapModality uses the fixed lookup and defaults to unspecified', () => {
    expect(mapModality('Online:  Asynchronous')).toBe(Modality.ONLINE_ASYNC);
    expect(mapModality('Hybrid (F2F & Online Instruc.)')).toBe(Modality.HYBRID);
    expect(mapModality('Hyflex')).toBe(Modality.UNSPECIFIED);
    expect(mapModality('')).toBe(Modality.UNSPECIFIED);
  });

  test('mapSectionType', () => {
    expect(mapSectionType('ONLINE COURSE')).toBe(SectionType.ONLINE);
    expect(mapSectionType('I')).toBe(SectionType.INDEPENDENT_STUDY);
    expect(mapSectionType('R')).toBe(SectionType.RESEARCH);
    expect(mapSectionType('')).toBe(SectionType.UNSPECIFIED);
  });

  test('parseCount', () => {
    expect(parseCount(' 45 ')).toBe(45);
    expect(parseCount('0')).toBe(0);
    expect(parseCount('')).toBeNull();
    expect(parseCount('TBA')).toBeNull();
    expect(parseCount('-3')).toBeNull();
  });

  test('cleanTitle strips a summer session prefix', () => {
    expect(cleanTitle('Summer I - 20-MAY-2024 Calculus of a Single Variable')).toBe('Calculus of a Single Variable');
    expect(cleanTitle('Summer II - 01-JUL-2024Organic Chemistry')).toBe('Organic Chemistry');
    expect(cleanTitle('  Linear   Algebra ')).toBe('Linear Algebra');
  });
});
