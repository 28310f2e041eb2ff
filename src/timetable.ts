/**
 * Timetable query API
 * search / CRN lookup / subjects / terms on top of builder, transport and parsers.
 */

import pLimit from 'p-limit';
import { loadConfig } from './config.js';
import type { Course } from './course.js';
import { AmbiguousResultError, InvalidParameterError, NotFoundError, ParseError } from './errors.js';
import { defaultTransport } from './httpClient.js';
import type { Transport } from './httpClient.js';
import { logger } from './logger.js';
import { parseSearchPage } from './parsers/courseParser.js';
import { parseSubjects, parseTerms } from './parsers/formOptionsParser.js';
import { buildSearchForm, termCode, validateYear } from './requestBuilder.js';
import type { SearchFilters, Semester, Subject, Term } from './types.js';

export interface TimetableOptions {
  baseUrl?: string;
  timeoutMs?: number;
  transport?: Transport;
  saveHtml?: boolean;
}

export interface BatchOptions extends TimetableOptions {
  concurrency?: number;
}

interface ResolvedOptions {
  baseUrl: string;
  timeoutMs: number;
  transport: Transport;
  saveHtml: boolean;
}

// Longest delay a Node timer accepts
const MAX_TIMEOUT_MS = 2_147_483_647;

function positiveInteger(value: number, parameter: string, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new InvalidParameterError(parameter, `Invalid ${parameter} ${value}: expected a whole number from 1 to ${max}`);
  }
  return value;
}

function resolveOptions(options: TimetableOptions): ResolvedOptions {
  const config = loadConfig();
  return {
    baseUrl: options.baseUrl ?? config.baseUrl,
    timeoutMs: positiveInteger(options.timeoutMs ?? config.timeoutMs, 'timeoutMs', MAX_TIMEOUT_MS),
    transport: options.transport ?? defaultTransport,
    saveHtml: options.saveHtml ?? config.saveHtml,
  };
}

/**
 * Run a parser; on ParseError optionally dump the page before rethrowing
 */
function parsePage<T>(html: string, label: string, saveHtml: boolean, parse: (html: string) => T): T {
  try {
    return parse(html);
  } catch (err) {
    if (err instanceof ParseError) {
      logger.error('Timetable', `${label}: ${err.message}`);
      if (saveHtml) {
        logger.saveRawHTML('parse-failed', label, html);
      }
    }
    throw err;
  }
}

/**
 * Search the timetable. Results keep the order the timetable returns them in.
 */
export async function searchTimetable(
  year: string | number,
  semester: Semester,
  filters: SearchFilters = {},
  options: TimetableOptions = {}
): Promise<Course[]> {
  const form = buildSearchForm({ ...filters, year, semester });
  const { baseUrl, timeoutMs, transport, saveHtml } = resolveOptions(options);

  const html = await transport.post(baseUrl, form, timeoutMs);
  const { courses, hasSectionColumn } = parsePage(html, `search-${form.TERMYEAR}`, saveHtml, page =>
    parseSearchPage(page, validateYear(year), semester)
  );

  const section = filters.section?.trim();
  if (section && courses.length > 0 && !hasSectionColumn) {
    throw new InvalidParameterError('section', `Cannot filter on section "${section}": the results have no Section column`);
  }
  const matches = section ? courses.filter(course => course.section === section) : courses;

  logger.debug('Timetable', `TERMYEAR ${form.TERMYEAR}: ${matches.length} sections`, form);
  return matches;
}

/**
 * Fetch the single section with the given CRN
 */
export async function getCrn(
  year: string | number,
  semester: Semester,
  crn: string,
  options: TimetableOptions = {}
): Promise<Course> {
  const results = await searchTimetable(year, semester, { crn }, options);

  if (results.length === 0) {
    throw new NotFoundError(`No section with CRN ${crn} in term ${termCode(year, semester)}`);
  }
  if (results.length > 1) {
    throw new AmbiguousResultError(`CRN ${crn} matched ${results.length} sections`, results.length);
  }
  return results[0];
}

/**
 * Whether the section with the given CRN currently has seats left.
 * Asks the timetable itself (open-only search) rather than reading counts,
 * since result pages do not always carry an Enrolled column.
 */
export async function checkOpenSpots(
  year: string | number,
  semester: Semester,
  crn: string,
  options: TimetableOptions = {}
): Promise<boolean> {
  const open = await searchTimetable(year, semester, { crn, openOnly: true }, options);
  return open.length > 0;
}

export async function getSubjects(options: TimetableOptions = {}): Promise<Subject[]> {
  const { baseUrl, timeoutMs, transport, saveHtml } = resolveOptions(options);
  const html = await transport.get(baseUrl, timeoutMs);
  return parsePage(html, 'subjects', saveHtml, parseSubjects);
}

export async function getSemesters(options: TimetableOptions = {}): Promise<Term[]> {
  const { baseUrl, timeoutMs, transport, saveHtml } = resolveOptions(options);
  const html = await transport.get(baseUrl, timeoutMs);
  return parsePage(html, 'terms', saveHtml, parseTerms);
}

/**
 * Search several subjects with bounded concurrency.
 * Any failing subject rejects the whole batch.
 */
export async function searchSubjects(
  year: string | number,
  semester: Semester,
  subjects: string[],
  filters: Omit<SearchFilters, 'subject'> = {},
  options: BatchOptions = {}
): Promise<Map<string, Course[]>> {
  const unique = [...new Set(subjects.map(s => s.trim().toUpperCase()).filter(s => s !== ''))];
  const limit = pLimit(positiveInteger(options.concurrency ?? loadConfig().concurrency, 'concurrency'));

  const results = await Promise.all(
    unique.map(subject =>
      limit(async () => {
        const courses = await searchTimetable(year, semester, { ...filters, subject }, options);
        logger.debug('Timetable', `${subject.padEnd(6)} ${courses.length} sections`);
        return [subject, courses] as const;
      })
    )
  );

  return new Map(results);
}
