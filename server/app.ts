import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { errorMessage } from "./errors";
import { log } from "./log";
import { registerRoutes } from "./routes";
import type { Services } from "./services";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

export function createApp(services: Services): Express {
  const app = express();

  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });

    next();
  });

  registerRoutes(app, services);

  // body-parser failures (malformed JSON, oversized payloads) land here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status >= 500) {
      console.error("Unhandled request error:", err);
      res.status(status).json({ error: "Internal Server Error", code: "INTERNAL_ERROR" });
      return;
    }
    res.status(status).json({ error: errorMessage(err), code: "BAD_REQUEST" });
  });

  return app;
}
