import express from "express";
import { getNavigationChannel, type NavigationChannel } from "@first-crack/shared";
import type { ApiConfig } from "./config/env.js";
import { createBrewService, type BrewService } from "./brewing/brewService.js";
import type { BrewIdSource } from "./brewing/brewRequest.js";
import { totalDurationSeconds } from "./brewing/brewTimeline.js";
import { StageScheduler } from "./brewing/stageScheduler.js";
import { createInteractionHandler } from "./interactions/interactionHandler.js";
import type { PushTransport } from "./push/transport.js";
import { emitBrewNavigation, emitStageOutcome } from "./realtime/brewEvents.js";
import { createBrewsRouter } from "./routes/brews.js";
import { createHealthRouter } from "./routes/health.js";
import { AppError, errorBody, internalError } from "./errors.js";
import { buildRequestLog, deriveBrewContext, errorMessage, isTestRuntime, log } from "./logger.js";

const REDACTED_KEYS = ["password", "token", "secret", "deviceaddress"];

export function sanitizeBody(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeBody(item));
  }
  if (value && typeof value === "object") {
    const entries = Object.entries(value).map(([key, val]) => {
      const lower = key.toLowerCase();
      if (REDACTED_KEYS.some((redacted) => lower.includes(redacted))) {
        return [key, "[REDACTED]"];
      }
      return [key, sanitizeBody(val)];
    });
    return Object.fromEntries(entries);
  }
  return value;
}

export type ServerDeps = {
  config: ApiConfig;
  transport: PushTransport;
  channel?: NavigationChannel;
  now?: () => number;
  idSource?: BrewIdSource;
};

export type ApiServer = {
  app: express.Express;
  scheduler: StageScheduler;
  service: BrewService;
  close: () => void;
};

export function createServer(deps: ServerDeps): ApiServer {
  const { config, transport } = deps;
  const app = express();
  app.use(express.json());

  const scheduler = new StageScheduler({
    transport,
    payloadOptions: {
      mediaBaseUrl: config.mediaBaseUrl,
      totalDurationSeconds: totalDurationSeconds(),
      deepLinkScheme: config.deepLinkScheme
    },
    now: deps.now,
    onStageOutcome: emitStageOutcome
  });
  const service = createBrewService({ scheduler, transport, idSource: deps.idSource });
  const interactions = createInteractionHandler({
    channel: deps.channel ?? getNavigationChannel(),
    scheme: config.deepLinkScheme,
    cancelBrew: (brewId) => scheduler.cancel(brewId),
    onNavigation: emitBrewNavigation
  });

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start,
          body: sanitizeBody(req.body)
        })
      );
    });
    next();
  });

  app.use("/health", createHealthRouter(() => scheduler.activeBrewIds().length));
  app.use(
    "/brews",
    createBrewsRouter({
      service,
      interactions,
      brewStartRateLimit: config.brewStartRateLimit,
      now: deps.now
    })
  );
  app.get("/", (_req, res) => {
    res.json({ ok: true, service: "api", status: "healthy" });
  });
  app.use((_req, res) => {
    res.status(404).json(errorBody(new AppError("NOT_FOUND", 404, "Not found")));
  });

  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      void _next;
      // express.json() reports unparseable bodies with a 400 status of its own.
      const appErr =
        err instanceof AppError
          ? err
          : err instanceof SyntaxError && "status" in err && err.status === 400
            ? new AppError("INVALID_JSON", 400, "Request body is not valid JSON")
            : undefined;
      const status = appErr?.status ?? 500;
      const message = appErr?.message ?? errorMessage(err);
      const context = deriveBrewContext(sanitizeBody(req.body));
      // 4xx are client errors (expected sometimes); 5xx are server errors.
      const level = status >= 500 ? "error" : "info";
      log({
        level,
        msg: "request_error",
        method: req.method,
        path: req.originalUrl ?? req.url,
        status,
        code: appErr?.code ?? "INTERNAL_ERROR",
        error: message,
        error_name: err instanceof Error ? err.name : undefined,
        error_stack:
          (status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1"
            ? err instanceof Error
              ? err.stack
              : undefined
            : undefined,
        ...context
      });
      res.status(status).json(errorBody(appErr ?? internalError()));
    }
  );

  return {
    app,
    scheduler,
    service,
    close: () => {
      scheduler.stopAll();
      interactions.close();
    }
  };
}
