import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import compression from "compression";
import { env, loadDiagnosticSettings } from "./config/env";
import { attachRequestContext } from "./middleware/requestContext";
import { createDiagnosticsRouter } from "./routes/diagnostics";
import type { DiagnoseOptions } from "./services/diagnostics";

export type AppOptions = Omit<DiagnoseOptions, "verbose" | "signal"> & {
  logRequests?: boolean;
};

export function createApp(options: AppOptions = {}) {
  const { logRequests = true, ...diagnoseOptions } = options;
  const settings = diagnoseOptions.settings ?? loadDiagnosticSettings();
  const app = express();

  const diagnoseLimiter = rateLimit({ windowMs: 1 * 60 * 1000, max: 30, standardHeaders: true, legacyHeaders: false });

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          connectSrc: ["'self'", env.corsOrigin],
          objectSrc: ["'none'"],
          baseUri: ["'self'"],
          frameAncestors: ["'none'"]
        }
      }
    })
  );
  app.use(cors({ origin: env.corsOrigin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(attachRequestContext);
  if (logRequests) app.use(morgan(env.nodeEnv === "production" ? "combined" : "dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "email-risk-diagnostics", timestamp: new Date().toISOString() });
  });

  app.use("/api/email/diagnose", diagnoseLimiter);
  app.use("/api/email", createDiagnosticsRouter({ ...diagnoseOptions, settings }));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found", requestId: res.locals.requestId });
  });

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = req.requestId || `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
    const statusCode = "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : 500;
    console.error(
      JSON.stringify({
        requestId,
        statusCode,
        message: err.message,
        stack: env.nodeEnv === "production" ? undefined : err.stack,
        path: req.path,
        method: req.method,
        at: new Date().toISOString()
      })
    );

    if (res.headersSent) return;
    const safeMessage = statusCode >= 500 && env.nodeEnv === "production" ? "Internal server error" : err.message || "Unexpected error";
    res.status(statusCode).json({ error: safeMessage, requestId });
  });

  return app;
}
