import { buildCatalogue } from "../domain/catalogue";
import { ScheduleService } from "../services/scheduleService";
import { CatalogueStore } from "../stores/catalogueStore";
import { parseCliArgs, runCli } from "./buildSchedule";

describe("buildSchedule CLI", () => {
  const store = new CatalogueStore(() =>
    buildCatalogue({
      CS280: [
        { section: "002", crn: 10021, meetings: [{ days: "MW", start: "10:00", end: "11:20" }] },
        { section: "004", crn: 10023, meetings: [{ days: "TR", start: "13:00", end: "14:20" }] },
      ],
      HUM102: [{ section: "W01", meetings: [] }],
    })
  );
  store.reload();
  const service = new ScheduleService(store);

  const run = (argv: string[]) => {
    const lines: string[] = [];
    const code = runCli(argv, service, (line) => lines.push(line));
    return { code, lines };
  };

  describe("parseCliArgs", () => {
    it("reads courses and options", () => {
      expect(parseCliArgs(["CS280", "hum102", "--start", "09:00", "--days", "MTWRF", "--cap", "5"])).toEqual({
        courses: ["CS280", "hum102"],
        start: "09:00",
        end: undefined,
        days: "MTWRF",
        cap: 5,
      });
    });
  });

  it("prints the summary and each schedule", () => {
    const { code, lines } = run(["cs280", "hum102"]);

    expect(code).toBe(0);
    expect(lines).toEqual([
      "2 schedule(s) found",
      "",
      "Schedule #1",
      "  CS280  002  CRN:10021  MW 10:00-11:20",
      "  HUM102  W01  TBA",
      "",
      "Schedule #2",
      "  CS280  004  CRN:10023  TR 13:00-14:20",
      "  HUM102  W01  TBA",
    ]);
  });

  it("prints the error and exits 1 for unknown courses", () => {
    const { code, lines } = run(["CS280", "CS999"]);

    expect(code).toBe(1);
    expect(lines).toEqual(["Unknown course: CS999"]);
  });

  it("rejects a non-numeric cap", () => {
    const { code, lines } = run(["CS280", "--cap", "lots"]);

    expect(code).toBe(1);
    expect(lines).toEqual(["cap must be a positive integer"]);
  });
});
