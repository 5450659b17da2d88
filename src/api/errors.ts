import { Response } from "express";
import {
  CatalogueUnavailableError,
  InvalidScheduleRequestError,
  MalformedCatalogueError,
  UnknownCourseError,
} from "../domain/errors";

export interface ErrorBody {
  error: string;
  message: string;
  courseIds?: string[];
}

/**
 * Map a thrown error to an HTTP status and JSON body.
 * Unknown courses and bad input are the caller's problem; a missing or broken
 * catalogue is a service-level failure.
 */
export function describeError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof UnknownCourseError) {
    return {
      status: 404,
      body: { error: "unknown-course", message: error.message, courseIds: error.courseIds },
    };
  }
  if (error instanceof InvalidScheduleRequestError) {
    return { status: 400, body: { error: "malformed-request", message: error.message } };
  }
  if (error instanceof CatalogueUnavailableError || error instanceof MalformedCatalogueError) {
    return { status: 503, body: { error: "catalogue-unavailable", message: error.message } };
  }
  return { status: 500, body: { error: "internal-error", message: "Unexpected server error" } };
}

export function sendError(res: Response, error: unknown, context: string): void {
  const { status, body } = describeError(error);
  if (status >= 500) {
    console.error(`Error ${context}:`, error);
  }
  res.status(status).json(body);
}
