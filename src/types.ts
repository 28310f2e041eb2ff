/**
 * VT Timetable Type Definitions
 */

// ============ Search Enumerations ============
// Values are the codes the timetable form posts.

export enum Semester {
  SPRING = '01',
  SUMMER = '06',
  FALL = '09',
  WINTER = '12',
}

export enum Campus {
  BLACKSBURG = '0',
  VIRTUAL = '10',
}

export enum Modality {
  IN_PERSON = 'A',
  HYBRID = 'H',
  ONLINE_SYNC = 'N',
  ONLINE_ASYNC = 'O',
  UNSPECIFIED = '',   // result-only, never sent
}

export enum SectionType {
  INDEPENDENT_STUDY = '%I%',
  LAB = '%B%',
  LECTURE = '%L%',
  RECITATION = '%C%',
  RESEARCH = '%R%',
  ONLINE = 'ONLINE',
  UNSPECIFIED = '',   // result-only, never sent
}

export enum Pathway {
  CLE_1 = 'AR01',
  CLE_2 = 'AR02',
  CLE_3 = 'AR03',
  CLE_4 = 'AR04',
  CLE_5 = 'AR05',
  CLE_6 = 'AR06',
  CLE_7 = 'AR07',
  PATH_1A = 'G01A',
  PATH_1F = 'G01F',
  PATH_2 = 'G02',
  PATH_3 = 'G03',
  PATH_4 = 'G04',
  PATH_5A = 'G05A',
  PATH_5F = 'G05F',
  PATH_6A = 'G06A',
  PATH_6D = 'G06D',
  PATH_7 = 'G07',
}

export enum Day {
  MONDAY = 'Monday',
  TUESDAY = 'Tuesday',
  WEDNESDAY = 'Wednesday',
  THURSDAY = 'Thursday',
  FRIDAY = 'Friday',
  SATURDAY = 'Saturday',
  SUNDAY = 'Sunday',
}

// ============ Search Parameters ============

export interface SearchFilters {
  campus?: Campus;
  pathway?: Pathway;
  subject?: string;       // "MATH"
  code?: string;          // "2114"
  crn?: string;           // "83075"
  section?: string;       // "1", filtered client-side
  instructor?: string;    // "Smith"
  sectionType?: SectionType;
  modality?: Modality;
  openOnly?: boolean;
}

export interface SearchParameters extends SearchFilters {
  year: string | number;
  semester: Semester;
}

// ============ Result Types ============

export interface Meeting {
  day: Day;
  begin: string;        // "10:10AM"
  end: string;          // "11:00AM"
  location: string;     // "MCB 100"
}

export interface CourseData {
  year: string;
  semester: Semester;
  crn: string;
  subject: string;
  code: string;
  section: string | null;
  title: string;
  sectionType: SectionType;
  modality: Modality;
  creditHours: string;  // "3" or "1-19"
  instructor: string;
  meetings: readonly Meeting[];
  location: string;
  capacity: number | null;   // null = unknown
  enrolled: number | null;
  waitlist: number | null;
  examCode: string;
}

export interface Subject {
  code: string;         // "MATH"
  name: string;         // "Mathematics"
}

export interface Term {
  year: string;         // as labelled, "2024"
  semester: Semester;
  termCode: string;     // "202401"
}
