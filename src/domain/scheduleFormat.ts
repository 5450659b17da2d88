import { Schedule, Section } from "./course";
import { EnumerationResult } from "./scheduleEnumerator";
import { formatClockTime, formatDays } from "./timeBlock";

export interface MeetingView {
  days: string; // "MW"
  start: string; // "HH:MM"
  end: string;
  location?: string;
}

export interface ScheduleEntryView {
  courseId: string;
  sectionId: string;
  crn?: number;
  title?: string;
  instructor?: string;
  credits?: number;
  meetings: MeetingView[];
}

export function toSectionView(section: Section): ScheduleEntryView {
  return {
    courseId: section.courseId,
    sectionId: section.id,
    crn: section.crn,
    title: section.title,
    instructor: section.instructor,
    credits: section.credits,
    meetings: section.blocks.map((block) => ({
      days: formatDays(block.days),
      start: formatClockTime(block.start),
      end: formatClockTime(block.end),
      location: block.location,
    })),
  };
}

export function toScheduleView(schedule: Schedule): ScheduleEntryView[] {
  return schedule.map((entry) => toSectionView(entry.section));
}

function formatMeetings(meetings: MeetingView[]): string {
  if (meetings.length === 0) return "TBA";
  return meetings.map((m) => `${m.days} ${m.start}-${m.end}`).join(", ");
}

/**
 * One line per course, e.g. "CS280  002  CRN:11234  MW 10:00-11:20".
 */
export function formatScheduleLines(schedule: Schedule): string[] {
  return toScheduleView(schedule).map((entry) => {
    const parts = [entry.courseId, entry.sectionId];
    if (entry.crn !== undefined) {
      parts.push(`CRN:${entry.crn}`);
    }
    parts.push(formatMeetings(entry.meetings));
    return parts.join("  ");
  });
}

export function summarizeResult(result: EnumerationResult, cap: number): string {
  const count = result.schedules.length;
  const heading = `${count} schedule(s) found`;
  return result.truncated ? `${heading} (showing first ${cap})` : heading;
}
