#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "util";

import { loadConfig } from "../config";
import { formatScheduleLines, summarizeResult } from "../domain/scheduleFormat";
import { ScheduleRequest, ScheduleService } from "../services/scheduleService";
import { CatalogueStore } from "../stores/catalogueStore";

/**
 * Build schedules from the terminal.
 *
 * Run with: npx ts-node src/cli/buildSchedule.ts CS280 CS241 --start 09:00 --end 16:00 --days MTWRF
 */

export function parseCliArgs(argv: string[]): ScheduleRequest {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      start: { type: "string" },
      end: { type: "string" },
      days: { type: "string" },
      cap: { type: "string" },
    },
  });

  return {
    courses: positionals,
    start: values.start,
    end: values.end,
    days: values.days,
    cap: values.cap === undefined ? undefined : Number(values.cap),
  };
}

/**
 * Print the summary and each schedule; returns the process exit code.
 */
export function runCli(
  argv: string[],
  service: ScheduleService,
  print: (line: string) => void = console.log
): number {
  try {
    const { result, cap } = service.run(parseCliArgs(argv));

    print(summarizeResult(result, cap));
    if (result.timedOut) {
      print("(search stopped at the time limit)");
    }
    result.schedules.forEach((schedule, index) => {
      print("");
      print(`Schedule #${index + 1}`);
      for (const line of formatScheduleLines(schedule)) {
        print(`  ${line}`);
      }
    });
    return 0;
  } catch (error) {
    print(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  const config = loadConfig();
  const store = CatalogueStore.fromFile(config.catalogueFile);
  const service = new ScheduleService(store, {
    maxSchedules: config.maxSchedules,
    searchTimeoutMs: config.searchTimeoutMs,
  });

  let exitCode = 1;
  try {
    store.reload();
    exitCode = runCli(process.argv.slice(2), service);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(exitCode);
}
