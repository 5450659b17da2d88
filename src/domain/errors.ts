/**
 * Raw catalogue data violates the data model. Raised while loading, never during a search.
 */
export class MalformedCatalogueError extends Error {
  readonly courseId?: string;
  readonly sectionId?: string;
  readonly issues: string[];

  constructor(
    issues: string[],
    location: { courseId?: string; sectionId?: string } = {}
  ) {
    const where = [
      location.courseId ? `course ${location.courseId}` : null,
      location.sectionId ? `section ${location.sectionId}` : null,
    ]
      .filter(Boolean)
      .join(", ");
    super(`Malformed catalogue${where ? ` (${where})` : ""}: ${issues.join("; ")}`);
    this.name = "MalformedCatalogueError";
    this.courseId = location.courseId;
    this.sectionId = location.sectionId;
    this.issues = issues;
  }
}

/**
 * One or more requested course ids are not in the catalogue.
 */
export class UnknownCourseError extends Error {
  readonly courseIds: string[];

  constructor(courseIds: string[]) {
    super(`Unknown course${courseIds.length === 1 ? "" : "s"}: ${courseIds.join(", ")}`);
    this.name = "UnknownCourseError";
    this.courseIds = courseIds;
  }
}

export class InvalidScheduleRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidScheduleRequestError";
  }
}

/**
 * No catalogue snapshot has been loaded successfully yet.
 */
export class CatalogueUnavailableError extends Error {
  constructor(cause?: unknown) {
    super("Catalogue is not available", { cause });
    this.name = "CatalogueUnavailableError";
  }
}
