import express, { Express } from "express";
import cors from "cors";

import { AppConfig } from "../config";
import { ScheduleService } from "../services/scheduleService";
import { CatalogueStore } from "../stores/catalogueStore";
import { createCatalogueRouter } from "./routes/catalogue";
import { createCoursesRouter } from "./routes/courses";
import { createHomeRouter } from "./routes/home";
import { createSchedulesRouter } from "./routes/schedules";

export function createApp(
  store: CatalogueStore,
  config: Pick<AppConfig, "corsOrigins" | "maxSchedules" | "searchTimeoutMs">
): Express {
  const app = express();
  const scheduleService = new ScheduleService(store, {
    maxSchedules: config.maxSchedules,
    searchTimeoutMs: config.searchTimeoutMs,
  });

  // Middleware
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Routes
  app.use("/", createHomeRouter(scheduleService));
  app.use("/api/solve", createSchedulesRouter(scheduleService));
  app.use("/api/courses", createCoursesRouter(store));
  app.use("/api/catalogue", createCatalogueRouter(store));

  // Health check
  app.get("/api/health", (req, res) => {
    const stats = store.stats();
    res.json({
      status: stats ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      catalogue: stats ? { loaded: true, ...stats } : { loaded: false },
    });
  });

  return app;
}
