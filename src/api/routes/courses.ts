import { Router } from "express";
import { toSectionView } from "../../domain/scheduleFormat";
import { CatalogueStore } from "../../stores/catalogueStore";
import { sendError } from "../errors";

export function createCoursesRouter(store: CatalogueStore): Router {
  const router = Router();

  // GET /api/courses - List course ids with section counts
  router.get("/", (req, res) => {
    try {
      const catalogue = store.current();
      const courseList = catalogue.courseIds().map((id) => ({
        id,
        sectionCount: catalogue.get(id)?.sections.length ?? 0,
      }));
      res.json(courseList);
    } catch (error) {
      sendError(res, error, "fetching courses");
    }
  });

  // GET /api/courses/:id - Course with all of its sections
  router.get("/:id", (req, res) => {
    try {
      const course = store.current().get(req.params.id);

      if (!course) {
        return res.status(404).json({
          error: "unknown-course",
          message: `Unknown course: ${req.params.id}`,
          courseIds: [req.params.id],
        });
      }

      res.json({ id: course.id, sections: course.sections.map(toSectionView) });
    } catch (error) {
      sendError(res, error, "fetching course");
    }
  });

  return router;
}
