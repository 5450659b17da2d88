import fs from "fs";
import { z } from "zod";
import {
  Catalogue,
  RawCatalogue,
  RawMeeting,
  RawSection,
  buildCatalogue,
} from "../domain/catalogue";
import { MalformedCatalogueError } from "../domain/errors";

/**
 * Catalogue Loader - reads all_sections.json into a Catalogue snapshot
 *
 * The file is produced by the refresh script. Shape problems are reported by the
 * zod schemas below; time-block invariants are checked by buildCatalogue.
 */

// ============================================
// Schemas
// ============================================

export const rawMeetingSchema: z.ZodType<RawMeeting> = z.object({
  days: z.string(),
  start: z.string(),
  end: z.string(),
  location: z.string().optional(),
});

export const rawSectionSchema: z.ZodType<RawSection> = z.object({
  section: z.union([z.string(), z.number()]).optional(),
  crn: z.number().int().optional(),
  title: z.string().optional(),
  instructor: z.string().optional(),
  credits: z.number().optional(),
  meetings: z.array(rawMeetingSchema).optional(),
  days: z.string().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  location: z.string().optional(),
});

export const rawCatalogueSchema: z.ZodType<RawCatalogue> = z.record(z.array(rawSectionSchema));

function describeIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

// ============================================
// Parsing
// ============================================

/**
 * Validate already-parsed JSON and build the catalogue.
 */
export function parseCatalogue(data: unknown, loadedAt: Date = new Date()): Catalogue {
  const result = rawCatalogueSchema.safeParse(data);
  if (!result.success) {
    const first = result.error.issues[0];
    const courseId = first && typeof first.path[0] === "string" ? first.path[0] : undefined;
    throw new MalformedCatalogueError(result.error.issues.map(describeIssue), { courseId });
  }
  return buildCatalogue(result.data, loadedAt);
}

export function parseCatalogueJson(text: string, loadedAt: Date = new Date()): Catalogue {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedCatalogueError([`invalid JSON: ${message}`]);
  }
  return parseCatalogue(data, loadedAt);
}

/**
 * Load a catalogue file from disk
 */
export function loadCatalogueFile(filePath: string): Catalogue {
  if (!fs.existsSync(filePath)) {
    throw new MalformedCatalogueError([
      `${filePath} is missing - run the refresh script first`,
    ]);
  }
  const rawData = fs.readFileSync(filePath, "utf-8");
  return parseCatalogueJson(rawData);
}
