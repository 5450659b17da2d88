import { buildCatalogue, RawCatalogue } from "../domain/catalogue";
import {
  CatalogueUnavailableError,
  InvalidScheduleRequestError,
  UnknownCourseError,
} from "../domain/errors";
import { CatalogueStore } from "../stores/catalogueStore";
import { ScheduleService, parseCourseList, parseFilters } from "./scheduleService";

const raw: RawCatalogue = {
  CS280: [
    { section: "002", crn: 10021, meetings: [{ days: "MW", start: "10:00", end: "11:20" }] },
    { section: "004", crn: 10023, meetings: [{ days: "TR", start: "13:00", end: "14:20" }] },
  ],
  CS241: [
    { section: "001", crn: 10101, meetings: [{ days: "MW", start: "10:00", end: "11:20" }] },
    { section: "003", crn: 10103, meetings: [{ days: "MW", start: "11:30", end: "12:50" }] },
  ],
  PHYS121: [],
};

const loadedStore = (): CatalogueStore => {
  const store = new CatalogueStore(() => buildCatalogue(raw));
  store.reload();
  return store;
};

describe("scheduleService", () => {
  describe("parseCourseList", () => {
    it("splits on spaces and commas and upper-cases", () => {
      expect(parseCourseList("cs280  CS241,math333")).toEqual(["CS280", "CS241", "MATH333"]);
    });

    it("accepts an array and drops duplicates", () => {
      expect(parseCourseList(["cs280", "CS280", " cs241 "])).toEqual(["CS280", "CS241"]);
    });

    it("requires at least one course", () => {
      expect(() => parseCourseList("  ")).toThrow(InvalidScheduleRequestError);
      expect(() => parseCourseList([])).toThrow("At least one course is required");
    });
  });

  describe("parseFilters", () => {
    it("returns no filters for blank fields", () => {
      expect(parseFilters({ start: "", end: " ", days: "" })).toEqual({});
    });

    it("parses the time window and days", () => {
      const filters = parseFilters({ start: "09:00", end: "16:00", days: "mtwrf" });

      expect(filters.earliest).toBe(540);
      expect(filters.latest).toBe(960);
      expect(filters.days && [...filters.days]).toEqual(["M", "T", "W", "R", "F"]);
    });

    it("rejects malformed times and day letters", () => {
      expect(() => parseFilters({ start: "9am" })).toThrow(
        "Earliest start must be a time in HH:MM format"
      );
      expect(() => parseFilters({ days: "MXF" })).toThrow("Unknown day letter(s): X (use MTWRFSU)");
    });

    it("rejects a window that closes before it opens", () => {
      expect(() => parseFilters({ start: "16:00", end: "09:00" })).toThrow(
        "Earliest start must be before latest finish"
      );
    });
  });

  describe("ScheduleService", () => {
    it("solves a request into schedule views", () => {
      const service = new ScheduleService(loadedStore());

      const response = service.solve({ courses: "cs280 cs241" });

      expect(response.courses).toEqual(["CS280", "CS241"]);
      expect(response.count).toBe(3);
      expect(response.truncated).toBe(false);
      expect(response.summary).toBe("3 schedule(s) found");
      expect(
        response.schedules.map((schedule) => schedule.map((entry) => entry.crn))
      ).toEqual([
        [10021, 10103],
        [10023, 10101],
        [10023, 10103],
      ]);
    });

    it("applies the time window before searching", () => {
      const service = new ScheduleService(loadedStore());

      const response = service.solve({ courses: ["CS280", "CS241"], start: "11:00" });

      expect(response.schedules.map((s) => s.map((e) => e.sectionId))).toEqual([["004", "003"]]);
    });

    it("bounds the cap by the configured maximum", () => {
      const service = new ScheduleService(loadedStore(), { maxSchedules: 2 });

      const response = service.solve({ courses: "CS280 CS241", cap: 10 });

      expect(response.cap).toBe(2);
      expect(response.count).toBe(2);
      expect(response.truncated).toBe(true);
      expect(response.summary).toBe("2 schedule(s) found (showing first 2)");
    });

    it("uses a smaller requested cap", () => {
      const service = new ScheduleService(loadedStore());

      expect(service.solve({ courses: "CS280 CS241", cap: 1 }).count).toBe(1);
      expect(() => service.solve({ courses: "CS280", cap: 0 })).toThrow(
        "cap must be a positive integer"
      );
    });

    it("returns an empty result for a course without sections", () => {
      const service = new ScheduleService(loadedStore());

      const response = service.solve({ courses: "CS280 PHYS121" });

      expect(response.schedules).toEqual([]);
      expect(response.truncated).toBe(false);
      expect(response.summary).toBe("0 schedule(s) found");
    });

    it("raises UnknownCourseError for missing courses", () => {
      const service = new ScheduleService(loadedStore());

      expect(() => service.solve({ courses: "CS280 CS999" })).toThrow(UnknownCourseError);
    });

    it("raises CatalogueUnavailableError before a catalogue loads", () => {
      const store = new CatalogueStore(() => buildCatalogue(raw));
      const service = new ScheduleService(store);

      expect(() => service.solve({ courses: "CS280" })).toThrow(CatalogueUnavailableError);
    });

    it("passes a deadline to the search when a timeout is configured", () => {
      let clock = 1000;
      const service = new ScheduleService(loadedStore(), {
        searchTimeoutMs: 50,
        now: () => {
          clock += 100;
          return clock;
        },
      });

      const response = service.solve({ courses: "CS280 CS241" });

      expect(response.timedOut).toBe(true);
      expect(response.count).toBe(0);
    });
  });
});
