import { Router } from "express";
import { ScheduleService } from "../../services/scheduleService";
import { describeError } from "../errors";
import { DEFAULT_FORM_VALUES, HomeFormValues, renderHomePage } from "../homePage";

function readField(body: unknown, name: keyof HomeFormValues): string {
  if (typeof body !== "object" || body === null) return "";
  const value: unknown = Reflect.get(body, name);
  return typeof value === "string" ? value : "";
}

export function createHomeRouter(scheduleService: ScheduleService): Router {
  const router = Router();

  // GET / - Empty form
  router.get("/", (req, res) => {
    res.type("html").send(renderHomePage({ form: DEFAULT_FORM_VALUES }));
  });

  // POST / - Form submit, render schedules or the error inline
  router.post("/", (req, res) => {
    const form: HomeFormValues = {
      courses: readField(req.body, "courses"),
      start: readField(req.body, "start"),
      end: readField(req.body, "end"),
      days: readField(req.body, "days"),
    };

    try {
      const outcome = scheduleService.run(form);
      res.type("html").send(renderHomePage({ form, outcome }));
    } catch (error) {
      const { status, body } = describeError(error);
      if (status >= 500) {
        console.error("Error rendering schedules:", error);
      }
      res.status(status).type("html").send(renderHomePage({ form, errorMessage: body.message }));
    }
  });

  return router;
}
