import cors from "cors";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import { createSiteRouter, type SiteRouterOptions } from "./routes/site";
import { logErrorEvent } from "./utils/logEvent";

export function createApp(options: SiteRouterOptions): Express {
  const app = express();

  app.use(cors());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      timestamp: Date.now(),
      message: "Site is running",
    });
  });

  app.use(createSiteRouter(options));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: { message: "Not found." },
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logErrorEvent("request_failed", error, {
      method: req.method,
      path: req.path,
    });

    const message =
      error instanceof Error ? error.message : "Internal server error";

    res.status(500).json({
      error: {
        message,
      },
    });
  });

  return app;
}
