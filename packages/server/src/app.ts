import express from "express";
import cors from "cors";
import { errorHandler } from "./middleware/error-handler.js";
import { createRouter } from "./routes.js";
import { AssessmentService } from "./services/assessment.service.js";

/** Large enough for a district's worth of GeoJSON segments */
const BODY_LIMIT = "50mb";

export function createApp(service = new AssessmentService()): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: BODY_LIMIT }));

  app.use(createRouter(service));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
