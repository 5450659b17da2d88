import { TimeBlock, conflicts } from "./timeBlock";

export interface Section {
  readonly id: string; // unique within its course, e.g. "002"
  readonly courseId: string;
  readonly blocks: readonly TimeBlock[]; // empty for online/async sections
  readonly crn?: number;
  readonly title?: string;
  readonly instructor?: string;
  readonly credits?: number;
}

export interface Course {
  readonly id: string; // e.g. "CS280"
  readonly sections: readonly Section[]; // catalogue order
}

export interface ScheduleEntry {
  readonly course: Course;
  readonly section: Section;
}

/**
 * One full assignment: exactly one section per requested course, in request order.
 */
export type Schedule = readonly ScheduleEntry[];

/**
 * Any block of one section overlapping any block of the other.
 * A section without blocks never conflicts.
 */
export function sectionsConflict(a: Section, b: Section): boolean {
  return a.blocks.some((blockA) => b.blocks.some((blockB) => conflicts(blockA, blockB)));
}

export function blockConflictsWithAny(block: TimeBlock, committed: readonly TimeBlock[]): boolean {
  return committed.some((other) => conflicts(block, other));
}

export function isScheduleValid(schedule: Schedule): boolean {
  for (let i = 0; i < schedule.length; i += 1) {
    for (let j = i + 1; j < schedule.length; j += 1) {
      if (sectionsConflict(schedule[i].section, schedule[j].section)) {
        return false;
      }
    }
  }
  return true;
}
