/**
 * Schedule Service
 *
 * Turns a student's request (course list plus optional time window and days) into
 * clash-free schedules using the live catalogue snapshot. Shared by the HTTP routes
 * and the command-line tool.
 */

import { z } from "zod";
import { Course } from "../domain/course";
import { InvalidScheduleRequestError } from "../domain/errors";
import { EnumerationResult, enumerateSchedules, DEFAULT_SCHEDULE_CAP } from "../domain/scheduleEnumerator";
import { ScheduleEntryView, summarizeResult, toScheduleView } from "../domain/scheduleFormat";
import { SectionFilters, applySectionFilters } from "../domain/sectionFilters";
import { normalizeCourseId } from "../domain/catalogue";
import { parseClockTime, parseDayLetters } from "../domain/timeBlock";
import { CatalogueStore } from "../stores/catalogueStore";

export interface ScheduleRequest {
  courses: string | string[];
  start?: string; // earliest start, "HH:MM"
  end?: string; // latest finish, "HH:MM"
  days?: string; // allowed days, e.g. "MTWRF"
  cap?: number;
}

export interface ScheduleOutcome {
  courses: Course[];
  result: EnumerationResult;
  cap: number;
}

export interface ScheduleResponse {
  courses: string[];
  count: number;
  cap: number;
  truncated: boolean;
  timedOut: boolean;
  summary: string;
  schedules: ScheduleEntryView[][];
}

export interface ScheduleServiceOptions {
  maxSchedules?: number;
  searchTimeoutMs?: number; // 0 or undefined: no deadline
  now?: () => number;
}

export const scheduleRequestSchema: z.ZodType<ScheduleRequest> = z.object({
  courses: z.union([z.string(), z.array(z.string())]),
  start: z.string().optional(),
  end: z.string().optional(),
  days: z.string().optional(),
  cap: z.number().optional(),
});

// ============================================
// Request parsing
// ============================================

/**
 * Split "CS280 cs241, MATH333" into ["CS280", "CS241", "MATH333"].
 * Duplicates are dropped, first occurrence wins.
 */
export function parseCourseList(input: string | string[]): string[] {
  const tokens = (Array.isArray(input) ? input : [input]).flatMap((part) => part.split(/[\s,]+/));

  const courses: string[] = [];
  for (const token of tokens) {
    const id = normalizeCourseId(token);
    if (id && !courses.includes(id)) {
      courses.push(id);
    }
  }

  if (courses.length === 0) {
    throw new InvalidScheduleRequestError("At least one course is required");
  }
  return courses;
}

function parseTimeField(value: string | undefined, label: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;

  const minutes = parseClockTime(value);
  if (minutes === null) {
    throw new InvalidScheduleRequestError(`${label} must be a time in HH:MM format`);
  }
  return minutes;
}

export function parseFilters(request: Pick<ScheduleRequest, "start" | "end" | "days">): SectionFilters {
  const filters: SectionFilters = {};

  const earliest = parseTimeField(request.start, "Earliest start");
  const latest = parseTimeField(request.end, "Latest finish");
  if (earliest !== undefined && latest !== undefined && earliest >= latest) {
    throw new InvalidScheduleRequestError("Earliest start must be before latest finish");
  }
  if (earliest !== undefined) filters.earliest = earliest;
  if (latest !== undefined) filters.latest = latest;

  if (request.days !== undefined && request.days.trim() !== "") {
    const { days, invalid } = parseDayLetters(request.days);
    if (invalid.length > 0) {
      throw new InvalidScheduleRequestError(
        `Unknown day letter(s): ${invalid.join("")} (use MTWRFSU)`
      );
    }
    filters.days = new Set(days);
  }

  return filters;
}

// ============================================
// Main Service Class
// ============================================

export class ScheduleService {
  private store: CatalogueStore;
  private maxSchedules: number;
  private searchTimeoutMs: number;
  private now: () => number;

  constructor(store: CatalogueStore, options: ScheduleServiceOptions = {}) {
    this.store = store;
    this.maxSchedules = options.maxSchedules ?? DEFAULT_SCHEDULE_CAP;
    this.searchTimeoutMs = options.searchTimeoutMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  /**
   * Requested cap, bounded by the configured maximum
   */
  resolveCap(requested?: number): number {
    if (requested === undefined) return this.maxSchedules;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new InvalidScheduleRequestError("cap must be a positive integer");
    }
    return Math.min(requested, this.maxSchedules);
  }

  /**
   * Look up, filter and enumerate. Throws UnknownCourseError, InvalidScheduleRequestError
   * or CatalogueUnavailableError; an empty result is returned normally.
   */
  run(request: ScheduleRequest): ScheduleOutcome {
    const courseIds = parseCourseList(request.courses);
    const filters = parseFilters(request);
    const cap = this.resolveCap(request.cap);

    // One snapshot for the whole request, even if a reload lands meanwhile
    const catalogue = this.store.current();
    const courses = catalogue.lookup(courseIds);
    const candidates = applySectionFilters(courses, filters);

    const deadline = this.searchTimeoutMs > 0 ? this.now() + this.searchTimeoutMs : undefined;
    const result = enumerateSchedules(candidates, { cap, deadline, now: this.now });

    return { courses, result, cap };
  }

  solve(request: ScheduleRequest): ScheduleResponse {
    const { courses, result, cap } = this.run(request);

    return {
      courses: courses.map((course) => course.id),
      count: result.schedules.length,
      cap,
      truncated: result.truncated,
      timedOut: result.timedOut,
      summary: summarizeResult(result, cap),
      schedules: result.schedules.map(toScheduleView),
    };
  }
}
