import path from "node:path";
import cors, { CorsOptions } from "cors";
import express, { ErrorRequestHandler, Request, Response } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { isMarketOpen } from "@tech-tracker/server-shared";
import type { AppConfig } from "./config";
import { renderDashboard, renderErrorPage } from "./dashboardView";
import { parseSortKey, toApiSnapshot, toApiStatus, toApiStocks } from "./presenters";
import type { RefreshCoordinator } from "./refreshCoordinator";
import type { RefreshScheduler } from "./refreshScheduler";
import type { SnapshotCache } from "./snapshotCache";

export interface ServerDependencies {
  config: AppConfig;
  cache: SnapshotCache;
  coordinator: Pick<RefreshCoordinator, "refresh" | "status">;
  scheduler?: Pick<RefreshScheduler, "isRunning">;
  marketOpen?: () => boolean;
  staticDir?: string;
}

const DEFAULT_STATIC_DIR = path.resolve(__dirname, "../public");

function buildCorsOptions(allowedOrigins: string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      if (allowedOrigins.length === 0 && process.env.NODE_ENV !== "production") {
        return callback(null, true);
      }
      console.warn(`Blocked CORS origin: ${origin}`);
      return callback(new Error("Not allowed by CORS"));
    }
  };
}

function wantsJson(req: Request) {
  return req.path.startsWith("/api/") || req.path === "/api";
}

function sendError(req: Request, res: Response, status: number, message: string) {
  if (wantsJson(req)) {
    res.status(status).json({ error: message });
    return;
  }
  res.status(status).type("html").send(renderErrorPage(status, message));
}

export function createServer({
  config,
  cache,
  coordinator,
  scheduler,
  marketOpen = () => isMarketOpen(),
  staticDir = DEFAULT_STATIC_DIR
}: ServerDependencies) {
  const app = express();
  const trackedSymbols = config.trackedSymbols.map((tracked) => tracked.symbol);

  // Served over plain HTTP: no HSTS and no upgrade of /static requests to https.
  app.use(
    helmet({
      hsts: false,
      contentSecurityPolicy: { directives: { upgradeInsecureRequests: null } }
    })
  );
  app.use(express.json());
  app.use("/static", express.static(staticDir));
  app.use(
    "/api",
    cors(buildCorsOptions(config.clientOrigins)),
    rateLimit({
      windowMs: 60_000,
      max: 60,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (req, res) => {
    const html = renderDashboard({
      entry: cache.get(),
      sort: parseSortKey(req.query.sort),
      refreshIntervalSeconds: config.refreshIntervalSeconds,
      pricePrecision: config.pricePrecision,
      volumePrecision: config.volumePrecision,
      marketOpen: marketOpen()
    });
    res.type("html").send(html);
  });

  app.get("/api/stocks", (req, res) => {
    res.json(toApiStocks(cache.get(), parseSortKey(req.query.sort), config.refreshIntervalSeconds));
  });

  app.post("/api/refresh", async (_req, res) => {
    try {
      const result = await coordinator.refresh("manual");
      if (result.success) {
        return res.json({ success: true, data: toApiSnapshot(result.snapshot), error: null });
      }
      return res.json({ success: false, data: null, error: result.error.message });
    } catch (error) {
      console.error("Manual refresh failed", error);
      return res.status(500).json({ success: false, data: null, error: "Unable to refresh stock data" });
    }
  });

  app.get("/api/status", (_req, res) => {
    res.json(
      toApiStatus(coordinator.status(), {
        refreshIntervalSeconds: config.refreshIntervalSeconds,
        backgroundRefreshRunning: scheduler?.isRunning() ?? false,
        trackedSymbols,
        marketOpen: marketOpen()
      })
    );
  });

  app.use((req, res) => {
    sendError(req, res, 404, "Not found");
  });

  const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
    console.error(`Request ${req.method} ${req.path} failed`, error);
    if (res.headersSent) {
      return next(error);
    }
    sendError(req, res, 500, "Internal server error");
  };
  app.use(errorHandler);

  return app;
}
