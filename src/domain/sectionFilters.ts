import { Course, Section } from "./course";
import { Weekday } from "./timeBlock";

/**
 * Hard constraints a student can put on every meeting of every chosen section.
 */
export interface SectionFilters {
  earliest?: number; // minutes after midnight
  latest?: number;
  days?: ReadonlySet<Weekday>;
}

export function hasFilters(filters: SectionFilters): boolean {
  return (
    filters.earliest !== undefined || filters.latest !== undefined || filters.days !== undefined
  );
}

export function sectionFits(section: Section, filters: SectionFilters): boolean {
  const { earliest, latest, days } = filters;

  return section.blocks.every((block) => {
    if (earliest !== undefined && block.start < earliest) return false;
    if (latest !== undefined && block.end > latest) return false;
    if (days) {
      for (const day of block.days) {
        if (!days.has(day)) return false;
      }
    }
    return true;
  });
}

/**
 * Narrow each course's candidate list to the sections that fit, keeping catalogue order.
 * Returns new Course objects; the catalogue's own courses are left untouched.
 */
export function applySectionFilters(
  courses: readonly Course[],
  filters: SectionFilters
): Course[] {
  if (!hasFilters(filters)) return [...courses];

  return courses.map((course) => ({
    id: course.id,
    sections: course.sections.filter((section) => sectionFits(section, filters)),
  }));
}
