import { Router, type Request, type RequestHandler } from "express";
import { AssessmentController } from "./controllers/assessment.controller.js";
import { ConfigController } from "./controllers/config.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import type { AssessmentService } from "./services/assessment.service.js";

/** Send the handler's result as JSON; rejections go to the error handler */
function json<T>(handler: (req: Request) => Promise<T>): RequestHandler {
  return (req, res, next) => {
    handler(req)
      .then((body) => {
        res.json(body);
      })
      .catch(next);
  };
}

export function createRouter(service: AssessmentService): Router {
  const health = new HealthController(service);
  const config = new ConfigController(service);
  const assessment = new AssessmentController(service);

  const router = Router();
  router.get("/health", json(() => health.getHealth()));
  router.get("/api/config/profiles", json(() => config.getProfiles()));
  router.get("/api/config/defaults", json((req) => config.getDefaults(req.query)));
  router.post("/api/assess", json((req) => assessment.assessSegment(req.body)));
  router.post("/api/assess/geojson", json((req) => assessment.assessGeojson(req.body, req.query)));
  return router;
}
