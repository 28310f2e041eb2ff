/**
 * Search Results Parser
 * Maps the timetable results table into Course records, in page order.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { Course } from '../course.js';
import { InvalidParameterError, ParseError } from '../errors.js';
import { logger } from '../logger.js';
import { Modality, SectionType } from '../types.js';
import type { CourseData, Meeting, Semester } from '../types.js';
import { parseMeetings } from './meetingParser.js';

// Banners the timetable prints instead of (or above) a results table
export const REQUEST_ERROR_MARKER = 'THERE IS AN ERROR WITH YOUR REQUEST';
export const NO_RESULTS_MARKER = 'NO SECTIONS FOUND FOR THIS INQUIRY';
export const PROBLEM_MARKER = 'There was a problem with your request';
export const ADDITIONAL_TIMES_MARKER = '* Additional Times *';

const MODALITY_TEXT: Record<string, Modality> = {
  'Face-to-Face Instruction': Modality.IN_PERSON,
  'Hybrid (F2F & Online Instruc.)': Modality.HYBRID,
  'Online with Synchronous Mtgs.': Modality.ONLINE_SYNC,
  'Online: Asynchronous': Modality.ONLINE_ASYNC,
};

const SECTION_TYPE_LETTERS: Record<string, SectionType> = {
  'I': SectionType.INDEPENDENT_STUDY,
  'B': SectionType.LAB,
  'L': SectionType.LECTURE,
  'C': SectionType.RECITATION,
  'R': SectionType.RESEARCH,
};

type Column =
  | 'crn' | 'course' | 'section' | 'title' | 'type' | 'modality' | 'credits'
  | 'capacity' | 'enrolled' | 'waitlist' | 'instructor' | 'days' | 'begin'
  | 'end' | 'location' | 'exam';

const HEADER_ALIASES: ReadonlyArray<readonly [Column, readonly string[]]> = [
  ['crn', ['crn']],
  ['course', ['course']],
  ['section', ['section', 'sec']],
  ['title', ['title']],
  ['type', ['schedule type', 'type']],
  ['modality', ['modality']],
  ['credits', ['cr hrs', 'credit hours', 'credits', 'hrs']],
  ['capacity', ['capacity', 'cap']],
  ['enrolled', ['enrolled', 'enrollment', 'actual', 'act']],
  ['waitlist', ['waitlist', 'wait list', 'wl']],
  ['instructor', ['instructor']],
  ['days', ['days']],
  ['begin', ['begin', 'start']],
  ['end', ['end']],
  ['location', ['location', 'room']],
  ['exam', ['exam']],
];

type ColumnMap = Partial<Record<Column, number>>;

export function mapModality(text: string): Modality {
  return MODALITY_TEXT[normalize(text)] ?? Modality.UNSPECIFIED;
}

export function mapSectionType(text: string): SectionType {
  const value = normalize(text).toUpperCase();
  if (value.startsWith('ONLINE COURSE')) return SectionType.ONLINE;
  const letter = value.match(/[LBICR]/);
  return letter ? SECTION_TYPE_LETTERS[letter[0]] : SectionType.UNSPECIFIED;
}

/**
 * Numeric cell -> count, or null when blank / non-numeric (TBA, cross-listed)
 */
export function parseCount(text: string): number | null {
  const value = normalize(text);
  return /^\d+$/.test(value) ? parseInt(value, 10) : null;
}

/**
 * Summer titles carry the session start date: "... - 22-MAY-2024Calculus"
 */
export function cleanTitle(text: string): string {
  const title = normalize(text);
  const session = title.match(/- \d{2}-[A-Z]{3}-\d{4}\s*(.+)$/);
  return session ? session[1].trim() : title;
}

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Cell texts with colspans expanded so indexes line up with the header
 */
function rowCells($: CheerioAPI, row: Element): string[] {
  const cells: string[] = [];
  $(row).children('td, th').each((_, td) => {
    const text = normalize($(td).text());
    const span = parseInt($(td).attr('colspan') ?? '1', 10);
    for (let i = 0; i < (span > 0 ? span : 1); i++) {
      cells.push(text);
    }
  });
  return cells;
}

function tableRows($: CheerioAPI, table: Element): Element[] {
  return $(table).children('thead, tbody, tfoot').children('tr').toArray();
}

function headerColumns(cells: string[]): ColumnMap {
  const columns: ColumnMap = {};
  cells.forEach((text, index) => {
    const label = text.toLowerCase().replace(/:$/, '');
    for (const [column, aliases] of HEADER_ALIASES) {
      if (aliases.includes(label) && columns[column] === undefined) {
        columns[column] = index;
      }
    }
  });
  return columns;
}

/**
 * Locate the results table: the first table with a header row holding a "CRN" cell
 */
function findResultsTable($: CheerioAPI): { rows: Element[]; headerIndex: number; columns: ColumnMap } | null {
  for (const table of $('table').toArray()) {
    const rows = tableRows($, table);
    const headerIndex = rows.findIndex(row =>
      rowCells($, row).some(text => text.toUpperCase() === 'CRN')
    );
    if (headerIndex === -1) continue;

    const columns = headerColumns(rowCells($, rows[headerIndex]));
    if (columns.course === undefined) continue;
    return { rows, headerIndex, columns };
  }
  return null;
}

function cell(cells: string[], index: number | undefined): string {
  return index === undefined ? '' : cells[index] ?? '';
}

function decodeRow(
  cells: string[],
  columns: ColumnMap,
  year: string,
  semester: Semester,
  rowNumber: number
): CourseData {
  const crnText = cell(cells, columns.crn);
  const crn = crnText.match(/^(\d{5})/);
  if (!crn) {
    throw new ParseError(`Row ${rowNumber}: CRN cell "${crnText}" is not a five-digit number`);
  }

  const courseText = cell(cells, columns.course);
  const course = courseText.match(/^(.+?)-(.+)$/);
  if (!course) {
    throw new ParseError(`Row ${rowNumber}: course cell "${courseText}" is not SUBJECT-NUMBER`);
  }

  const modalityText = cell(cells, columns.modality);
  const modality = mapModality(modalityText);
  if (modality === Modality.UNSPECIFIED && modalityText !== '') {
    logger.debug('Parser', `Unrecognized modality "${modalityText}" for CRN ${crn[1]}`);
  }

  const location = cell(cells, columns.location);
  const section = cell(cells, columns.section);

  return {
    year,
    semester,
    crn: crn[1],
    subject: course[1].trim(),
    code: course[2].trim(),
    section: section === '' ? null : section,
    title: cleanTitle(cell(cells, columns.title)),
    sectionType: mapSectionType(cell(cells, columns.type)),
    modality,
    creditHours: cell(cells, columns.credits),
    instructor: cell(cells, columns.instructor),
    meetings: parseMeetings(
      cell(cells, columns.days),
      cell(cells, columns.begin),
      cell(cells, columns.end),
      location
    ),
    location,
    capacity: parseCount(cell(cells, columns.capacity)),
    enrolled: parseCount(cell(cells, columns.enrolled)),
    waitlist: parseCount(cell(cells, columns.waitlist)),
    examCode: cell(cells, columns.exam),
  };
}

function additionalMeetings(cells: string[], columns: ColumnMap, existing: readonly Meeting[]): Meeting[] {
  return parseMeetings(
    cell(cells, columns.days),
    cell(cells, columns.begin),
    cell(cells, columns.end),
    cell(cells, columns.location),
    existing
  );
}

export interface SearchResultsPage {
  courses: Course[];
  // false when the table has no Section column (every course.section is null)
  hasSectionColumn: boolean;
}

/**
 * Parse a search response into courses, along with what the results table carried.
 * An empty list means the timetable reported no matching sections;
 * a missing or undecodable table raises ParseError and nothing is returned.
 */
export function parseSearchPage(html: string, year: string, semester: Semester): SearchResultsPage {
  if (html.includes(REQUEST_ERROR_MARKER)) {
    throw new InvalidParameterError('search', 'The timetable rejected the search parameters');
  }
  if (html.includes(NO_RESULTS_MARKER)) {
    return { courses: [], hasSectionColumn: false };
  }

  const $ = cheerio.load(html);

  if (html.includes(PROBLEM_MARKER)) {
    const message = normalize($('.red_msg').first().text()) || PROBLEM_MARKER;
    throw new InvalidParameterError('search', message);
  }

  const table = findResultsTable($);
  if (!table) {
    throw new ParseError('Results table not found (no header row with a CRN column)');
  }

  const drafts: CourseData[] = [];

  table.rows.slice(table.headerIndex + 1).forEach((row, offset) => {
    const rowNumber = offset + 1;
    const cells = rowCells($, row);

    if (cells.some(text => text === ADDITIONAL_TIMES_MARKER)) {
      const previous = drafts[drafts.length - 1];
      if (!previous) {
        throw new ParseError(`Row ${rowNumber}: additional times row has no preceding course`);
      }
      drafts[drafts.length - 1] = {
        ...previous,
        meetings: [...previous.meetings, ...additionalMeetings(cells, table.columns, previous.meetings)],
      };
      return;
    }

    // Spacer and comment rows carry no CRN
    if (cell(cells, table.columns.crn) === '') return;

    drafts.push(decodeRow(cells, table.columns, year, semester, rowNumber));
  });

  return {
    courses: drafts.map(data => new Course(data)),
    hasSectionColumn: table.columns.section !== undefined,
  };
}

export function parseSearchResults(html: string, year: string, semester: Semester): Course[] {
  return parseSearchPage(html, year, semester).courses;
}
