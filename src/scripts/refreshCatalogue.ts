/**
 * Refresh script: download the registrar's schedule-builder feed and rewrite all_sections.json
 *
 * Run once per term (or from cron):
 *   npx ts-node src/scripts/refreshCatalogue.ts              # CATALOGUE_URL or the default feed
 *   npx ts-node src/scripts/refreshCatalogue.ts <feed-url>   # a specific term
 *
 * The feed is JavaScript of the form `define({data:[ ... ]})` with bare identifiers.
 */

import "dotenv/config";
import fs from "fs";
import path from "path";
import { z } from "zod";

import { loadConfig } from "../config";
import { Catalogue, RawCatalogue, RawMeeting, RawSection } from "../domain/catalogue";
import { formatClockTime } from "../domain/timeBlock";
import { parseCatalogue } from "../loaders/catalogueLoader";

// Feed day numbers start on Sunday
const DAY_BY_NUMBER: Record<number, string> = {
  1: "U",
  2: "M",
  3: "T",
  4: "W",
  5: "R",
  6: "F",
  7: "S",
};

const DAY_ORDER = "MTWRFSU";
const MINUTES_PER_DAY = 24 * 60;
const STRING_LITERAL = /"(?:[^"\\]|\\.)*"/g;

const feedSchema = z.object({
  data: z.array(z.array(z.unknown())),
});

export interface TransformStats {
  courses: number;
  sections: number;
  skippedMeetings: number;
}

// ============================================
// Feed text -> JSON
// ============================================

/**
 * Pull the object literal out of `define( ... )`
 */
export function extractDefinePayload(js: string): string {
  const match = /define\(([\s\S]*)\)\s*;?\s*$/.exec(js);
  if (!match) {
    throw new Error("Could not find the define( wrapper - the feed format has changed");
  }
  return match[1].trim();
}

const quoteBareKeys = (code: string): string =>
  code.replace(/([{[,])\s*([A-Za-z_]\w*)\s*:/g, '$1"$2":');

/**
 * Quote bare object keys: {data:[...]} -> {"data":[...]}
 * Text inside double-quoted strings is left as it is.
 */
export function quoteIdentifiers(text: string): string {
  let result = "";
  let last = 0;
  for (const match of text.matchAll(STRING_LITERAL)) {
    const index = match.index ?? last;
    result += quoteBareKeys(text.slice(last, index)) + match[0];
    last = index + match[0].length;
  }
  return result + quoteBareKeys(text.slice(last));
}

const secondsToMinutes = (seconds: number): number => Math.floor(seconds / 60);

export function secondsToClock(seconds: number): string {
  return formatClockTime(secondsToMinutes(seconds));
}

// ============================================
// Feed rows -> raw catalogue
// ============================================

function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (typeof value === "number") return String(value);
  return undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

/**
 * Meetings sharing time and room collapse into one entry with several days.
 * Rows that are short or on an unknown day are skipped, as are rows whose range is
 * empty once rounded down to whole minutes or that run past midnight.
 */
export function transformMeetings(rows: unknown): { meetings: RawMeeting[]; skipped: number } {
  if (!Array.isArray(rows)) return { meetings: [], skipped: 0 };

  const merged = new Map<string, { days: Set<string>; meeting: RawMeeting }>();
  let skipped = 0;

  for (const row of rows) {
    if (!Array.isArray(row) || row.length < 4) {
      skipped += 1;
      continue;
    }
    const cells: unknown[] = row;
    const [dayNumber, startSeconds, endSeconds, room] = cells;
    const day = typeof dayNumber === "number" ? DAY_BY_NUMBER[dayNumber] : undefined;
    const start = asNumber(startSeconds);
    const end = asNumber(endSeconds);
    if (
      !day ||
      start === undefined ||
      end === undefined ||
      start < 0 ||
      secondsToMinutes(start) >= secondsToMinutes(end) ||
      secondsToMinutes(end) > MINUTES_PER_DAY
    ) {
      skipped += 1;
      continue;
    }

    const location = asString(room);
    const meeting: RawMeeting = {
      days: "",
      start: secondsToClock(start),
      end: secondsToClock(end),
      ...(location ? { location } : {}),
    };
    const key = `${meeting.start}|${meeting.end}|${location ?? ""}`;
    const existing = merged.get(key);
    if (existing) {
      existing.days.add(day);
    } else {
      merged.set(key, { days: new Set([day]), meeting });
    }
  }

  const meetings = Array.from(merged.values()).map(({ days, meeting }) => ({
    ...meeting,
    days: [...DAY_ORDER].filter((d) => days.has(d)).join(""),
  }));
  return { meetings, skipped };
}

/**
 * Section row layout: [course, sectionId, crn, credits, instructor, ...flags, title, meetings]
 */
export function transformSectionRow(row: unknown): { section: RawSection; skipped: number } | null {
  if (!Array.isArray(row) || row.length < 7) return null;
  const cells: unknown[] = row;

  const sectionId = asString(cells[1]);
  const crn = asNumber(cells[2]);
  if (!sectionId && crn === undefined) return null;

  const { meetings, skipped } = transformMeetings(cells[cells.length - 1]);
  const section: RawSection = {
    section: sectionId ?? String(crn),
    ...(crn !== undefined ? { crn } : {}),
    ...(asString(cells[cells.length - 2]) ? { title: asString(cells[cells.length - 2]) } : {}),
    ...(asString(cells[4]) ? { instructor: asString(cells[4]) } : {}),
    ...(asNumber(cells[3]) !== undefined ? { credits: asNumber(cells[3]) } : {}),
    meetings,
  };
  return { section, skipped };
}

/**
 * Convert the feed's array-heavy structure into course -> sections.
 * Course rows are [courseCode, _, _, ...sectionRows].
 */
export function transformFeed(blob: unknown): { catalogue: RawCatalogue; stats: TransformStats } {
  const feed = feedSchema.parse(blob);
  const catalogue: RawCatalogue = {};
  const stats: TransformStats = { courses: 0, sections: 0, skippedMeetings: 0 };

  for (const courseRow of feed.data) {
    const courseCode = asString(courseRow[0]);
    if (!courseCode) continue;

    const sections = catalogue[courseCode] ?? [];
    const seen = new Set(sections.map((s) => String(s.section)));
    for (const sectionRow of courseRow.slice(3)) {
      const transformed = transformSectionRow(sectionRow);
      if (!transformed) continue;

      stats.skippedMeetings += transformed.skipped;
      const id = String(transformed.section.section);
      if (seen.has(id)) continue;
      seen.add(id);
      sections.push(transformed.section);
    }

    if (!(courseCode in catalogue)) {
      stats.courses += 1;
    }
    catalogue[courseCode] = sections;
  }

  stats.sections = Object.values(catalogue).reduce((sum, list) => sum + list.length, 0);
  return { catalogue, stats };
}

export function parseFeed(js: string): { catalogue: RawCatalogue; stats: TransformStats } {
  const json = quoteIdentifiers(extractDefinePayload(js));
  return transformFeed(JSON.parse(json));
}

/**
 * Validate the converted catalogue with the same checks the server runs at startup,
 * then write it. Nothing is written when validation fails.
 */
export function saveCatalogue(filePath: string, catalogue: RawCatalogue): Catalogue {
  const validated = parseCatalogue(catalogue);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(catalogue, null, 1));
  return validated;
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const config = loadConfig();
  const url = process.argv[2] ?? config.catalogueUrl;

  console.log(`Downloading catalogue from ${url} ...`);
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Feed request failed: ${response.status} ${response.statusText}`);
  }

  const { catalogue, stats } = parseFeed(await response.text());
  saveCatalogue(config.catalogueFile, catalogue);

  console.log(
    `Saved ${stats.sections.toLocaleString()} sections across ${stats.courses} courses -> ${config.catalogueFile}`
  );
  if (stats.skippedMeetings > 0) {
    console.log(`  (${stats.skippedMeetings} malformed meeting rows skipped)`);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Error refreshing catalogue:", error);
    process.exit(1);
  });
}
