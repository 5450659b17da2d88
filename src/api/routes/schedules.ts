import { Router } from "express";
import { InvalidScheduleRequestError } from "../../domain/errors";
import { ScheduleService, scheduleRequestSchema } from "../../services/scheduleService";
import { sendError } from "../errors";

export function createSchedulesRouter(scheduleService: ScheduleService): Router {
  const router = Router();

  // POST /api/solve - Enumerate clash-free schedules for the requested courses
  router.post("/", (req, res) => {
    try {
      const parsed = scheduleRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidScheduleRequestError(
          "courses is required (array or space-separated string); start, end, days must be strings; cap a number"
        );
      }

      res.json(scheduleService.solve(parsed.data));
    } catch (error) {
      sendError(res, error, "solving schedules");
    }
  });

  return router;
}
