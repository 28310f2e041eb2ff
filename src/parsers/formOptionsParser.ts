/**
 * Search form option parsers (subjects and terms)
 */

import * as cheerio from 'cheerio';
import { ParseError } from '../errors.js';
import { Semester } from '../types.js';
import type { Subject, Term } from '../types.js';

const SEMESTER_CODES: Record<string, Semester> = {
  '01': Semester.SPRING,
  '06': Semester.SUMMER,
  '09': Semester.FALL,
  '12': Semester.WINTER,
};

// Subjects are also populated per term by script: new Option("MATH - Mathematics","MATH")
const SCRIPT_SUBJECT = /\("([A-Z]+) - (.+?)"/g;

/**
 * Extract the distinct subjects offered by the search form.
 * Duplicates (by code) collapse to their first occurrence.
 */
export function parseSubjects(html: string): Subject[] {
  const $ = cheerio.load(html);
  const select = $('select[name="subj_code"]');
  const subjects = new Map<string, Subject>();

  select.find('option').each((_, el) => {
    const value = ($(el).attr('value') ?? '').trim();
    const label = $(el).text().replace(/\s+/g, ' ').trim();
    if (value === '' || value === '%') return;

    const match = label.match(/^([A-Z]+)\s+-\s+(.+)$/);
    const code = match ? match[1] : value;
    const name = match ? match[2] : label;
    if (!subjects.has(code)) {
      subjects.set(code, { code, name });
    }
  });

  let scriptEntries = 0;
  for (const match of html.matchAll(SCRIPT_SUBJECT)) {
    scriptEntries++;
    const [, code, name] = match;
    if (!subjects.has(code)) {
      subjects.set(code, { code, name: name.trim() });
    }
  }

  if (select.length === 0 && scriptEntries === 0) {
    throw new ParseError('Subject list not found (no subj_code dropdown on the page)');
  }

  return [...subjects.values()];
}

/**
 * Extract the terms listed in the TERMYEAR dropdown.
 * The option value carries the semester ("202406" -> summer); the year comes from
 * the label ("Summer I 2024"), since winter terms are filed under the previous year.
 */
export function parseTerms(html: string): Term[] {
  const $ = cheerio.load(html);
  const select = $('select[name="TERMYEAR"]');
  if (select.length === 0) {
    throw new ParseError('Term list not found (no TERMYEAR dropdown on the page)');
  }

  const terms = new Map<string, Term>();
  select.find('option').each((_, el) => {
    const termCode = ($(el).attr('value') ?? '').trim();
    const code = termCode.match(/^(\d{4})(\d{2})$/);
    const semester = code ? SEMESTER_CODES[code[2]] : undefined;
    if (!code || !semester || terms.has(termCode)) return;

    const labelYear = $(el).text().trim().match(/(\d{4})$/);
    const year = labelYear
      ? labelYear[1]
      : String(Number(code[1]) + (semester === Semester.WINTER ? 1 : 0));
    terms.set(termCode, { year, semester, termCode });
  });

  return [...terms.values()];
}
