/**
 * Request Builder
 * Translates typed search parameters into the timetable form fields.
 */

import { InvalidParameterError } from './errors.js';
import { Campus, Modality, Pathway, SectionType, Semester } from './types.js';
import type { SearchParameters } from './types.js';

export const MIN_YEAR = 1970;
export const MAX_YEAR = 2100;

type StringEnum = Record<string, string>;

function isEnumValue<E extends StringEnum>(enumObj: E, value: unknown): value is E[keyof E] {
  const values: string[] = Object.values(enumObj);
  return typeof value === 'string' && value !== '' && values.includes(value);
}

function requireEnum<E extends StringEnum>(enumObj: E, value: unknown, parameter: string): E[keyof E] {
  if (!isEnumValue(enumObj, value)) {
    throw new InvalidParameterError(parameter, `Unrecognized ${parameter}: ${String(value)}`);
  }
  return value;
}

/**
 * Resolve an enum member from its name, e.g. "online-sync" -> Modality.ONLINE_SYNC
 */
export function enumFromName<E extends StringEnum>(enumObj: E, name: string, parameter: string): E[keyof E] {
  const key = name.trim().toUpperCase().replace(/[\s-]+/g, '_');
  for (const [member, value] of Object.entries(enumObj)) {
    if (member === key && value !== '') {
      return requireEnum(enumObj, value, parameter);
    }
  }
  const options = Object.entries(enumObj)
    .filter(([, value]) => value !== '')
    .map(([member]) => member.toLowerCase().replace(/_/g, '-'));
  throw new InvalidParameterError(parameter, `Unrecognized ${parameter} "${name}" (expected one of: ${options.join(', ')})`);
}

export function validateYear(year: string | number): string {
  const text = String(year).trim();
  if (!/^\d{4}$/.test(text)) {
    throw new InvalidParameterError('year', `Year must be a four-digit number, got "${text}"`);
  }
  const value = Number(text);
  if (value < MIN_YEAR || value > MAX_YEAR) {
    throw new InvalidParameterError('year', `Year ${value} is outside ${MIN_YEAR}-${MAX_YEAR}`);
  }
  return text;
}

/**
 * Composite term code: year + semester code.
 * Winter terms are filed under the previous calendar year (Winter 2024 -> "202312").
 */
export function termCode(year: string | number, semester: Semester): string {
  const validYear = validateYear(year);
  const sem = requireEnum(Semester, semester, 'semester');
  const termYear = sem === Semester.WINTER ? String(Number(validYear) - 1) : validYear;
  return termYear + sem;
}

// Empty strings count as "not supplied"
function optionalText(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function matchOrThrow(value: string, pattern: RegExp, parameter: string, expected: string): string {
  if (!pattern.test(value)) {
    throw new InvalidParameterError(parameter, `Invalid ${parameter} "${value}": expected ${expected}`);
  }
  return value;
}

/**
 * Build the POST form for a timetable search. Only supplied filters appear.
 * `section` has no form field; the caller filters on it after parsing.
 */
export function buildSearchForm(params: SearchParameters): Record<string, string> {
  const form: Record<string, string> = {
    TERMYEAR: termCode(params.year, params.semester),
  };

  if (params.campus !== undefined) {
    form.CAMPUS = requireEnum(Campus, params.campus, 'campus');
  }
  if (params.pathway !== undefined) {
    form.CORE_CODE = requireEnum(Pathway, params.pathway, 'pathway');
  }

  const subject = optionalText(params.subject);
  if (subject !== null) {
    form.subj_code = matchOrThrow(subject.toUpperCase(), /^[A-Z]{2,5}$/, 'subject', '2-5 letters');
  }

  const code = optionalText(params.code);
  if (code !== null) {
    form.CRSE_NUMBER = matchOrThrow(code.toUpperCase(), /^\d{4}[A-Z]?$/, 'code', 'four digits, optionally followed by a letter');
  }

  const crn = optionalText(params.crn);
  if (crn !== null) {
    form.crn = matchOrThrow(crn, /^\d{5}$/, 'crn', 'five digits');
  }

  const instructor = optionalText(params.instructor);
  if (instructor !== null) {
    form.inst_name = instructor;
  }

  if (params.sectionType !== undefined) {
    form.SCHDTYPE = requireEnum(SectionType, params.sectionType, 'sectionType');
  }
  if (params.modality !== undefined) {
    form.sess_code = requireEnum(Modality, params.modality, 'modality');
  }
  if (params.openOnly) {
    form.open_only = 'on';
  }

  return form;
}
