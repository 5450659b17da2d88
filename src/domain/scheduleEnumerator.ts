import { Course, Schedule, ScheduleEntry, Section, blockConflictsWithAny } from "./course";
import { TimeBlock } from "./timeBlock";

export const DEFAULT_SCHEDULE_CAP = 50;

export interface EnumerateOptions {
  cap?: number;
  deadline?: number; // epoch ms; checked between candidate attempts
  now?: () => number;
}

export interface EnumerationResult {
  schedules: Schedule[];
  truncated: boolean; // stopped by the cap with an open branch left
  timedOut: boolean;
}

const fitsBlocks = (section: Section, committed: readonly TimeBlock[]): boolean =>
  !section.blocks.some((block) => blockConflictsWithAny(block, committed));

/**
 * Depth-first walk that records, in `path`, the index of the section currently chosen
 * at each depth. `path` is complete whenever a schedule is yielded.
 */
function* walkSchedules(
  courses: readonly Course[],
  shouldStop: () => boolean,
  path: number[]
): Generator<Schedule, void, undefined> {
  if (courses.some((course) => course.sections.length === 0)) {
    return;
  }

  const chosen: ScheduleEntry[] = [];
  const committed: TimeBlock[] = [];

  function* search(depth: number): Generator<Schedule, void, undefined> {
    if (depth === courses.length) {
      yield Object.freeze([...chosen]);
      return;
    }

    const course = courses[depth];
    for (let index = 0; index < course.sections.length; index += 1) {
      if (shouldStop()) return;
      const section = course.sections[index];
      if (!fitsBlocks(section, committed)) {
        continue;
      }

      path[depth] = index;
      chosen.push({ course, section });
      committed.push(...section.blocks);
      try {
        yield* search(depth + 1);
      } finally {
        committed.length -= section.blocks.length;
        chosen.pop();
        path.length = depth;
      }
    }
  }

  yield* search(0);
}

/**
 * Lazily walk every clash-free schedule, depth-first over courses in the given order
 * and sections in catalogue order. Conflicts are checked when a section is committed,
 * so a prefix that already clashes is never extended.
 *
 * With no courses the single empty schedule is produced; a course with no sections
 * produces nothing.
 */
export function iterateSchedules(
  courses: readonly Course[],
  shouldStop: () => boolean = () => false
): Generator<Schedule, void, undefined> {
  return walkSchedules(courses, shouldStop, []);
}

/**
 * Whether the walk stopped at `path` still has a branch worth exploring: a later section
 * at some depth that fits the sections chosen above it and leaves every following course
 * at least one fitting section.
 */
function hasOpenBranch(courses: readonly Course[], path: readonly number[]): boolean {
  const prefix: TimeBlock[] = [];
  for (let depth = 0; depth < path.length; depth += 1) {
    const { sections } = courses[depth];
    const following = courses.slice(depth + 1);
    const open = sections.slice(path[depth] + 1).some((candidate) => {
      if (!fitsBlocks(candidate, prefix)) return false;
      const withCandidate = [...prefix, ...candidate.blocks];
      return following.every((later) => later.sections.some((section) => fitsBlocks(section, withCandidate)));
    });
    if (open) return true;
    prefix.push(...sections[path[depth]].blocks);
  }
  return false;
}

/**
 * Collect up to `cap` schedules in discovery order. The walk ends as soon as the cap is
 * reached; `truncated` then reports whether an unexplored branch remains, so a cap that
 * lands on the last schedule of the space reports false.
 */
export function enumerateSchedules(
  courses: readonly Course[],
  options: EnumerateOptions = {}
): EnumerationResult {
  const cap = options.cap ?? DEFAULT_SCHEDULE_CAP;
  if (!Number.isInteger(cap) || cap < 1) {
    throw new RangeError(`Schedule cap must be a positive integer, got ${cap}`);
  }

  const { deadline } = options;
  const now = options.now ?? Date.now;
  let timedOut = false;
  const shouldStop = (): boolean => {
    if (deadline === undefined) return false;
    if (!timedOut && now() >= deadline) {
      timedOut = true;
    }
    return timedOut;
  };

  const schedules: Schedule[] = [];
  const path: number[] = [];
  const iterator = walkSchedules(courses, shouldStop, path);

  let truncated = false;
  for (let next = iterator.next(); !next.done; next = iterator.next()) {
    schedules.push(next.value);
    if (schedules.length >= cap) {
      truncated = hasOpenBranch(courses, path);
      break;
    }
  }
  iterator.return(undefined);

  return { schedules, truncated, timedOut };
}
