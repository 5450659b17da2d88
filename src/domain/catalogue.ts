import { Course, Section } from "./course";
import { MalformedCatalogueError, UnknownCourseError } from "./errors";
import { TimeBlock, createTimeBlock } from "./timeBlock";

// ============================================
// Raw source shape
// ============================================

export interface RawMeeting {
  days: string; // e.g. "MW"
  start: string; // "HH:MM"
  end: string;
  location?: string;
}

/**
 * A section as written in all_sections.json. Older files carry a single meeting
 * as top-level days/start/end instead of a meetings list.
 */
export interface RawSection {
  section?: string | number;
  crn?: number;
  title?: string;
  instructor?: string;
  credits?: number;
  meetings?: RawMeeting[];
  days?: string;
  start?: string;
  end?: string;
  location?: string;
}

export type RawCatalogue = Record<string, RawSection[]>;

export interface CatalogueStats {
  courses: number;
  sections: number;
  loadedAt: string;
}

/**
 * Canonical course id: upper-case, no whitespace ("cs 280" -> "CS280").
 */
export function normalizeCourseId(id: string): string {
  return id.replace(/\s+/g, "").toUpperCase();
}

// ============================================
// Catalogue snapshot
// ============================================

/**
 * Read-only course -> sections snapshot. Never mutated after construction;
 * a refresh builds a new Catalogue instead.
 */
export class Catalogue {
  private readonly courses: ReadonlyMap<string, Course>;
  readonly loadedAt: Date;

  constructor(courses: Iterable<Course>, loadedAt: Date = new Date()) {
    const byId = new Map<string, Course>();
    for (const course of courses) {
      byId.set(course.id, course);
    }
    this.courses = byId;
    this.loadedAt = loadedAt;
  }

  get(courseId: string): Course | undefined {
    return this.courses.get(normalizeCourseId(courseId));
  }

  courseIds(): string[] {
    return Array.from(this.courses.keys()).sort();
  }

  /**
   * Resolve requested ids to courses, keeping request order.
   * Throws UnknownCourseError listing every id that is missing.
   */
  lookup(courseIds: readonly string[]): Course[] {
    const found: Course[] = [];
    const missing: string[] = [];

    for (const rawId of courseIds) {
      const id = normalizeCourseId(rawId);
      const course = this.courses.get(id);
      if (course) {
        found.push(course);
      } else if (!missing.includes(id)) {
        missing.push(id);
      }
    }

    if (missing.length > 0) {
      throw new UnknownCourseError(missing);
    }
    return found;
  }

  stats(): CatalogueStats {
    let sections = 0;
    for (const course of this.courses.values()) {
      sections += course.sections.length;
    }
    return {
      courses: this.courses.size,
      sections,
      loadedAt: this.loadedAt.toISOString(),
    };
  }
}

// ============================================
// Construction from raw data
// ============================================

function rawMeetingsOf(raw: RawSection): RawMeeting[] {
  if (raw.meetings) return raw.meetings;
  if (raw.days === undefined && raw.start === undefined && raw.end === undefined) {
    return [];
  }
  return [
    {
      days: raw.days ?? "",
      start: raw.start ?? "",
      end: raw.end ?? "",
      location: raw.location,
    },
  ];
}

function buildSection(courseId: string, raw: RawSection): Section {
  const rawId = raw.section ?? raw.crn;
  const id = rawId === undefined ? "" : String(rawId).trim();
  if (!id) {
    throw new MalformedCatalogueError(["section has neither a section id nor a CRN"], {
      courseId,
    });
  }

  const blocks: TimeBlock[] = [];
  for (const meeting of rawMeetingsOf(raw)) {
    try {
      blocks.push(createTimeBlock(meeting.days, meeting.start, meeting.end, meeting.location));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new MalformedCatalogueError([message], { courseId, sectionId: id });
    }
  }

  const section: Section = {
    id,
    courseId,
    blocks: Object.freeze(blocks),
    ...(raw.crn !== undefined ? { crn: raw.crn } : {}),
    ...(raw.title ? { title: raw.title } : {}),
    ...(raw.instructor ? { instructor: raw.instructor } : {}),
    ...(raw.credits !== undefined ? { credits: raw.credits } : {}),
  };
  return Object.freeze(section);
}

/**
 * Validate raw catalogue data and build an immutable Catalogue.
 * Every time-block invariant is checked here so the enumerator can trust its input.
 */
export function buildCatalogue(raw: RawCatalogue, loadedAt: Date = new Date()): Catalogue {
  const courses: Course[] = [];
  const seenCourses = new Set<string>();

  for (const [rawCourseId, rawSections] of Object.entries(raw)) {
    const courseId = normalizeCourseId(rawCourseId);
    if (!courseId) {
      throw new MalformedCatalogueError(["empty course id"]);
    }
    if (seenCourses.has(courseId)) {
      throw new MalformedCatalogueError(["duplicate course id"], { courseId });
    }
    seenCourses.add(courseId);

    const sections: Section[] = [];
    const seenSections = new Set<string>();
    for (const rawSection of rawSections) {
      const section = buildSection(courseId, rawSection);
      if (seenSections.has(section.id)) {
        throw new MalformedCatalogueError(["duplicate section id"], {
          courseId,
          sectionId: section.id,
        });
      }
      seenSections.add(section.id);
      sections.push(section);
    }

    courses.push(Object.freeze({ id: courseId, sections: Object.freeze(sections) }));
  }

  return new Catalogue(courses, loadedAt);
}
