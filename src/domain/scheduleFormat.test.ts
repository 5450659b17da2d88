import { Course, Schedule, Section } from "./course";
import { formatScheduleLines, summarizeResult, toScheduleView } from "./scheduleFormat";
import { createTimeBlock } from "./timeBlock";

describe("scheduleFormat", () => {
  const cs280: Section = {
    id: "002",
    courseId: "CS280",
    crn: 10021,
    title: "Programming Language Concepts",
    blocks: [createTimeBlock("WM", "10:00", "11:20", "KUPF 107")],
  };
  const math333: Section = {
    id: "002",
    courseId: "MATH333",
    blocks: [createTimeBlock("TR", "10:00", "11:20"), createTimeBlock("F", "10:00", "10:50")],
  };
  const online: Section = { id: "W01", courseId: "HUM102", crn: 10990, blocks: [] };

  const course = (section: Section): Course => ({ id: section.courseId, sections: [section] });
  const schedule: Schedule = [cs280, math333, online].map((section) => ({
    course: course(section),
    section,
  }));

  describe("toScheduleView", () => {
    it("renders days in week order and times as HH:MM", () => {
      const [first] = toScheduleView(schedule);

      expect(first).toEqual({
        courseId: "CS280",
        sectionId: "002",
        crn: 10021,
        title: "Programming Language Concepts",
        instructor: undefined,
        credits: undefined,
        meetings: [{ days: "MW", start: "10:00", end: "11:20", location: "KUPF 107" }],
      });
    });
  });

  describe("formatScheduleLines", () => {
    it("prints one line per course", () => {
      expect(formatScheduleLines(schedule)).toEqual([
        "CS280  002  CRN:10021  MW 10:00-11:20",
        "MATH333  002  TR 10:00-11:20, F 10:00-10:50",
        "HUM102  W01  CRN:10990  TBA",
      ]);
    });
  });

  describe("summarizeResult", () => {
    it("mentions the cap only when truncated", () => {
      expect(summarizeResult({ schedules: [schedule], truncated: false, timedOut: false }, 50)).toBe(
        "1 schedule(s) found"
      );
      expect(summarizeResult({ schedules: [schedule, schedule], truncated: true, timedOut: false }, 2)).toBe(
        "2 schedule(s) found (showing first 2)"
      );
    });
  });
});
