/**
 * Course - one scheduled section from the timetable
 */

import type { CourseData, Meeting, Modality, SectionType, Semester } from './types.js';

export class Course implements CourseData {
  readonly year: string;
  readonly semester: Semester;
  readonly crn: string;
  readonly subject: string;
  readonly code: string;
  readonly section: string | null;
  readonly title: string;
  readonly sectionType: SectionType;
  readonly modality: Modality;
  readonly creditHours: string;
  readonly instructor: string;
  readonly meetings: readonly Meeting[];
  readonly location: string;
  readonly capacity: number | null;
  readonly enrolled: number | null;
  readonly waitlist: number | null;
  readonly examCode: string;

  constructor(data: CourseData) {
    this.year = data.year;
    this.semester = data.semester;
    this.crn = data.crn;
    this.subject = data.subject;
    this.code = data.code;
    this.section = data.section;
    this.title = data.title;
    this.sectionType = data.sectionType;
    this.modality = data.modality;
    this.creditHours = data.creditHours;
    this.instructor = data.instructor;
    this.meetings = Object.freeze(data.meetings.map(m => Object.freeze({ ...m })));
    this.location = data.location;
    this.capacity = data.capacity;
    this.enrolled = data.enrolled;
    this.waitlist = data.waitlist;
    this.examCode = data.examCode;
    Object.freeze(this);
  }

  /** "MATH-2114" */
  get courseId(): string {
    return `${this.subject}-${this.code}`;
  }

  /**
   * Seats left, or null when capacity or enrollment is unknown
   */
  seatsRemaining(): number | null {
    if (this.capacity === null || this.enrolled === null) return null;
    return Math.max(this.capacity - this.enrolled, 0);
  }

  /**
   * True only when both counts are known and capacity exceeds enrollment
   */
  hasOpenSpots(): boolean {
    const remaining = this.seatsRemaining();
    return remaining !== null && remaining > 0;
  }

  toString(): string {
    const seats = this.capacity === null
      ? 'capacity unknown'
      : `${this.enrolled ?? '?'}/${this.capacity}`;
    return `${this.crn} ${this.courseId} ${this.title} (${this.instructor || 'Staff'}, ${seats})`;
  }
}
