/**
 * vtt - command line front end for the timetable client
 */

import { Command } from 'commander';
import type { Course } from './course.js';
import type { Transport } from './httpClient.js';
import { logger } from './logger.js';
import { enumFromName } from './requestBuilder.js';
import {
  checkOpenSpots,
  getCrn,
  getSemesters,
  getSubjects,
  searchSubjects,
  searchTimetable,
} from './timetable.js';
import type { TimetableOptions } from './timetable.js';
import { Campus, Modality, Pathway, SectionType, Semester } from './types.js';
import type { SearchFilters } from './types.js';

export interface CliContext {
  transport?: Transport;
  print?: (line: string) => void;
}

interface SearchCommandOptions {
  subject?: string;
  code?: string;
  crn?: string;
  section?: string;
  instructor?: string;
  modality?: string;
  campus?: string;
  type?: string;
  pathway?: string;
  open?: boolean;
  json?: boolean;
  timeout?: string;
}

interface RequestCommandOptions {
  json?: boolean;
  timeout?: string;
}

const SEMESTER_LABELS: Record<Semester, string> = {
  [Semester.SPRING]: 'Spring',
  [Semester.SUMMER]: 'Summer',
  [Semester.FALL]: 'Fall',
  [Semester.WINTER]: 'Winter',
};

function formatCourse(course: Course): string {
  const seats = course.capacity === null
    ? '   ?'
    : `${String(course.enrolled ?? '?').padStart(3)}/${course.capacity}`;
  const days = course.meetings.map(m => `${m.day.slice(0, 3)} ${m.begin}-${m.end}`).join(', ');
  return `${course.crn}  ${course.courseId.padEnd(10)} ${course.title.padEnd(32).slice(0, 32)} ${seats.padEnd(8)} ${days || 'ARR'}`;
}

function buildFilters(opts: SearchCommandOptions): SearchFilters {
  return {
    code: opts.code,
    crn: opts.crn,
    section: opts.section,
    instructor: opts.instructor,
    openOnly: opts.open === true,
    modality: opts.modality ? enumFromName(Modality, opts.modality, 'modality') : undefined,
    campus: opts.campus ? enumFromName(Campus, opts.campus, 'campus') : undefined,
    sectionType: opts.type ? enumFromName(SectionType, opts.type, 'sectionType') : undefined,
    pathway: opts.pathway ? enumFromName(Pathway, opts.pathway, 'pathway') : undefined,
  };
}

export function createProgram(context: CliContext = {}): Command {
  const print = context.print ?? ((line: string) => console.log(line));
  const program = new Command();

  // Malformed --timeout values reach the API and are rejected there
  const requestOptions = (timeout?: string): TimetableOptions => ({
    transport: context.transport,
    timeoutMs: timeout === undefined ? undefined : Number(timeout),
  });

  program
    .name('vtt')
    .description('Query the Virginia Tech Timetable of Classes')
    .version('1.0.0')
    .option('--log-dir <dir>', 'also write this run\'s log (and raw HTML of unparsable pages) under <dir>')
    .hook('preAction', () => {
      const { logDir } = program.opts<{ logDir?: string }>();
      if (logDir) {
        logger.startSession('vtt', logDir);
      }
    });

  program
    .command('search')
    .description('Search sections for a term')
    .argument('<year>', 'four-digit year, e.g. 2024')
    .argument('<semester>', 'spring | summer | fall | winter')
    .option('-s, --subject <codes>', 'subject code, or a comma-separated list')
    .option('-c, --code <number>', 'course number, e.g. 2114')
    .option('--crn <crn>', 'course reference number')
    .option('--section <section>', 'section number')
    .option('-i, --instructor <name>', 'instructor last name')
    .option('-m, --modality <modality>', 'in-person | hybrid | online-sync | online-async')
    .option('--campus <campus>', 'blacksburg | virtual')
    .option('-t, --type <type>', 'lecture | lab | recitation | research | independent-study | online')
    .option('-p, --pathway <pathway>', 'e.g. cle-1, path-1a')
    .option('-o, --open', 'only sections with open seats')
    .option('--json', 'print JSON')
    .option('--timeout <ms>', 'request timeout in milliseconds')
    .action(async (year: string, semesterName: string, opts: SearchCommandOptions) => {
      const semester = enumFromName(Semester, semesterName, 'semester');
      const filters = buildFilters(opts);
      const subjects = (opts.subject ?? '').split(',').map(s => s.trim()).filter(s => s !== '');
      const startTime = Date.now();

      let courses: Course[];
      if (subjects.length > 1) {
        const bySubject = await searchSubjects(year, semester, subjects, filters, requestOptions(opts.timeout));
        courses = [...bySubject.values()].flat();
      } else {
        courses = await searchTimetable(year, semester, { ...filters, subject: subjects[0] }, requestOptions(opts.timeout));
      }

      if (opts.json) {
        print(JSON.stringify(courses, null, 2));
        return;
      }

      courses.forEach(course => print(formatCourse(course)));
      logger.summary('Search Complete', {
        'Sections': courses.length,
        'With open seats': courses.filter(c => c.hasOpenSpots()).length,
        'Time elapsed': `${((Date.now() - startTime) / 1000).toFixed(1)}s`,
      });
    });

  program
    .command('crn')
    .description('Look up one section by CRN')
    .argument('<year>', 'four-digit year')
    .argument('<semester>', 'spring | summer | fall | winter')
    .argument('<crn>', 'five-digit course reference number')
    .option('--json', 'print JSON')
    .option('--timeout <ms>', 'request timeout in milliseconds')
    .action(async (year: string, semesterName: string, crn: string, opts: RequestCommandOptions) => {
      const semester = enumFromName(Semester, semesterName, 'semester');
      const options = requestOptions(opts.timeout);
      const course = await getCrn(year, semester, crn, options);
      if (opts.json) {
        print(JSON.stringify(course, null, 2));
        return;
      }
      // Without an Enrolled column the counts cannot answer, so ask the timetable
      const open = course.enrolled === null
        ? await checkOpenSpots(year, semester, crn, options)
        : course.hasOpenSpots();
      print(formatCourse(course));
      print(`  ${open ? 'Open' : 'No open seats'} | ${course.instructor || 'Staff'} | ${course.location || 'TBA'}`);
    });

  program
    .command('subjects')
    .description('List subject codes offered by the timetable')
    .option('--timeout <ms>', 'request timeout in milliseconds')
    .action(async (opts: RequestCommandOptions) => {
      const subjects = await getSubjects(requestOptions(opts.timeout));
      subjects
        .sort((a, b) => a.code.localeCompare(b.code))
        .forEach(s => print(`${s.code.padEnd(6)} ${s.name}`));
    });

  program
    .command('terms')
    .description('List terms available in the timetable')
    .option('--timeout <ms>', 'request timeout in milliseconds')
    .action(async (opts: RequestCommandOptions) => {
      const terms = await getSemesters(requestOptions(opts.timeout));
      terms.forEach(t => print(`${t.termCode}  ${SEMESTER_LABELS[t.semester]} ${t.year}`));
    });

  return program;
}
