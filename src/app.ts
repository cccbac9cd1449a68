import express, { Express } from "express";
import cors from "cors";
import * as eventsController from "./controllers/events.controller";
import { createAuthMiddleware } from "./middleware/auth.middleware";
import type { ObservableSink } from "./models/record.model";

export interface AppOptions {
  sink: ObservableSink;
  apiKey?: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();
  const auth = createAuthMiddleware(options.apiKey);

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // Public routes
  app.get("/health", eventsController.healthCheck);

  // Protected routes
  app.post("/events", auth, eventsController.postEvent(options.sink));
  app.get("/stats", auth, eventsController.getStats(options.sink));

  return app;
}
