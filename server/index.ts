// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
// Do NOT move dotenv loading into db.ts or services.
import dotenv from "dotenv";
dotenv.config();

import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { loadConfig, ConfigError } from "./config";
import { registerRoutes } from "./routes";
import { createDatabase } from "./db";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./memStorage";
import { configureRuntime, createRuntime } from "./runtime";
import { configureNotifications } from "./services/notificationService";
import { createDraftingAdapter } from "./services/draftingService";
import { startScheduler, stopScheduler } from "./services/schedulerService";
import { seedTenants } from "./seed";
import { log, logWarn, logError, errorMessage } from "./logger";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number") return status;
  }
  return 500;
}

async function main(): Promise<void> {
  const config = loadConfig();

  let storage: IStorage;
  if (config.databaseUrl) {
    storage = new DatabaseStorage(createDatabase(config.databaseUrl).db);
  } else {
    logWarn("DATABASE_URL not set; using in-process storage (data is lost on restart)", "storage");
    storage = new MemStorage();
  }

  configureNotifications({ ...config.email, slackWebhookUrl: config.slackWebhookUrl });
  const runtime = createRuntime({ storage, drafting: createDraftingAdapter(config.drafting) });
  configureRuntime(runtime);

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json());
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

  await registerRoutes(httpServer, app);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = statusOf(err);
    const message = errorMessage(err) || "Internal Server Error";

    logError("Request failed", "express", err);

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json({ message });
  });

  if (config.env === "development") {
    try {
      await seedTenants(storage);
    } catch (err) {
      logError("Seed failed", "seed", err);
    }
  }

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);

    if (config.scheduler.enabled) {
      startScheduler(runtime, config.scheduler).catch((err: unknown) => {
        logError("Scheduler failed to start", "scheduler", err);
      });
    } else {
      log("Scheduler disabled (SCHEDULER_ENABLED=false)", "scheduler");
    }
  });

  const shutdown = () => {
    stopScheduler();
    httpServer.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) logError(issue, "config");
  } else {
    logError("Startup failed", "express", err);
  }
  process.exit(1);
});
