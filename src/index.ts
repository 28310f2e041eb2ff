/**
 * vt-timetable - Virginia Tech Timetable of Classes client
 */

export {
  searchTimetable,
  getCrn,
  checkOpenSpots,
  getSubjects,
  getSemesters,
  searchSubjects,
} from './timetable.js';
export type { TimetableOptions, BatchOptions } from './timetable.js';
export { Course } from './course.js';
export {
  TimetableError,
  InvalidParameterError,
  TransportError,
  ParseError,
  NotFoundError,
  AmbiguousResultError,
} from './errors.js';
export type { TransportFailure } from './errors.js';
export { buildSearchForm, termCode, validateYear, enumFromName } from './requestBuilder.js';
export { createFetchTransport } from './httpClient.js';
export type { Transport, FetchLike, FetchResponse, FetchInit } from './httpClient.js';
export { parseSearchPage, parseSearchResults } from './parsers/courseParser.js';
export type { SearchResultsPage } from './parsers/courseParser.js';
export { parseSubjects, parseTerms } from './parsers/formOptionsParser.js';
export { loadConfig } from './config.js';
export type { TimetableConfig } from './config.js';
export { logger, LogLevel } from './logger.js';
export * from './types.js';
