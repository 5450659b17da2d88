import { Router } from "express";
import { CatalogueStore } from "../../stores/catalogueStore";
import { sendError } from "../errors";

export function createCatalogueRouter(store: CatalogueStore): Router {
  const router = Router();

  // GET /api/catalogue - Stats of the live snapshot
  router.get("/", (req, res) => {
    try {
      res.json(store.current().stats());
    } catch (error) {
      sendError(res, error, "fetching catalogue stats");
    }
  });

  // POST /api/catalogue/reload - Re-read the catalogue file and swap the snapshot
  router.post("/reload", (req, res) => {
    try {
      const stats = store.reload().stats();
      console.log(`Catalogue reloaded: ${stats.courses} courses, ${stats.sections} sections`);
      res.json(stats);
    } catch (error) {
      sendError(res, error, "reloading catalogue");
    }
  });

  return router;
}
