import http from "node:http";
import path from "node:path";

import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response
} from "express";
import { z } from "zod";

import { cameraCapabilities, cameraPresets } from "./camera";
import type { Dashboard } from "./dashboard";
import { ensureLogger, type LoggerLike } from "./logger";
import { RealtimeGateway } from "./realtime";
import { sparkConnectedPage, sparkFailedPage } from "./spark-pages";
import { availableTools } from "./tools";
import type { ToolArgs } from "./types";

const triggerToolSchema = z.object({
  args: z.record(z.unknown()).optional()
});

const paramsSchema = z.record(z.unknown());

const tuningModeSchema = z.object({
  enabled: z.boolean()
});

const TRACKER_UNAVAILABLE = "Tuning not available (tracker not connected)";
const CAMERA_UNAVAILABLE = "Camera config not available";
const SPARK_UNAVAILABLE = "Spark not configured";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function invalidBody(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: "Invalid payload",
    details: error.issues
  });
}

function respondWith(status: number, error: string): RequestHandler {
  return (_req, res) => {
    res.status(status).json({ error });
  };
}

// Tool buttons post whatever they have; anything unreadable means no args.
function toolArgs(body: unknown): ToolArgs {
  if (typeof body !== "string" || body.trim() === "") return {};
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    return {};
  }
  const parsed = triggerToolSchema.safeParse(decoded);
  return parsed.success ? (parsed.data.args ?? {}) : {};
}

export interface AppOptions {
  staticDir?: string;
  logger?: LoggerLike;
}

/**
 * REST surface of the dashboard. Routes whose hook is missing answer before
 * the body is read, so a malformed body never masks the missing integration.
 */
export function createApp(dashboard: Dashboard, options: AppOptions = {}): express.Express {
  const log = ensureLogger(options.logger);
  const { hooks } = dashboard;
  const jsonBody = express.json();
  const rawBody = express.text({ type: () => true });

  const app = express();

  // Permissive CORS so a dashboard served from a dev server can reach the API.
  app.use("/api", (req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  if (options.staticDir) {
    app.use(express.static(path.resolve(process.cwd(), options.staticDir)));
  }

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      hubs: dashboard.describeHubs()
    });
  });

  app.get("/api/status", (_req, res) => {
    res.json(dashboard.getState());
  });

  app.get("/api/logs", (_req, res) => {
    res.json(dashboard.getLogs());
  });

  app.get("/api/conversation", (_req, res) => {
    res.json(dashboard.getConversation());
  });

  app.get("/api/hubs", (_req, res) => {
    res.json({ hubs: dashboard.describeHubs() });
  });

  app.get("/api/tools", (_req, res) => {
    res.json(availableTools);
  });

  const { onToolTrigger } = hooks;
  if (onToolTrigger) {
    app.post("/api/tools/:name", rawBody, async (req, res) => {
      const { name } = req.params;
      try {
        const result = await onToolTrigger(name, toolArgs(req.body));
        dashboard.addLog("tool", `Manual: ${name} → ${result}`);
        res.json({ tool: name, result });
      } catch (error) {
        res.status(500).json({ error: errorMessage(error) });
      }
    });
  } else {
    app.post("/api/tools/:name", respondWith(500, "Tool trigger not configured"));
  }

  // Head tracking

  const { onGetTuningParams, onSetTuningParams, onSetTuningMode } = hooks;
  app.get(
    "/api/tracking/params",
    onGetTuningParams
      ? (_req, res) => {
          res.json(onGetTuningParams());
        }
      : respondWith(503, TRACKER_UNAVAILABLE)
  );

  if (onSetTuningParams) {
    app.post("/api/tracking/params", jsonBody, (req, res) => {
      const parsed = paramsSchema.safeParse(req.body);
      if (!parsed.success) {
        invalidBody(res, parsed.error);
        return;
      }
      onSetTuningParams(parsed.data);
      res.json({ status: "ok", updated: parsed.data });
    });
  } else {
    app.post("/api/tracking/params", respondWith(503, TRACKER_UNAVAILABLE));
  }

  if (onSetTuningMode) {
    app.post("/api/tracking/tuning-mode", jsonBody, (req, res) => {
      const parsed = tuningModeSchema.safeParse(req.body);
      if (!parsed.success) {
        invalidBody(res, parsed.error);
        return;
      }
      onSetTuningMode(parsed.data.enabled);
      res.json({
        status: "ok",
        mode: parsed.data.enabled ? "tuning (secondary features disabled)" : "normal"
      });
    });
  } else {
    app.post("/api/tracking/tuning-mode", respondWith(503, TRACKER_UNAVAILABLE));
  }

  // Camera

  const { onGetCameraConfig, onSetCameraConfig } = hooks;
  app.get(
    "/api/camera/config",
    onGetCameraConfig
      ? (_req, res) => {
          res.json(onGetCameraConfig());
        }
      : respondWith(503, CAMERA_UNAVAILABLE)
  );

  if (onSetCameraConfig) {
    app.post("/api/camera/config", jsonBody, (req, res) => {
      const parsed = paramsSchema.safeParse(req.body);
      if (!parsed.success) {
        invalidBody(res, parsed.error);
        return;
      }
      try {
        onSetCameraConfig(parsed.data);
      } catch (error) {
        res.status(400).json({ error: errorMessage(error) });
        return;
      }
      res.json({ status: "ok", updated: parsed.data });
    });
  } else {
    app.post("/api/camera/config", respondWith(503, CAMERA_UNAVAILABLE));
  }

  app.get("/api/camera/presets", (_req, res) => {
    res.json({ presets: cameraPresets });
  });

  app.get("/api/camera/capabilities", (_req, res) => {
    res.json(cameraCapabilities);
  });

  // Spark (Google Docs sync)

  const { onSparkGetStatus, onSparkAuthStart, onSparkAuthCallback, onSparkDisconnect } = hooks;
  app.get("/api/spark/status", (_req, res) => {
    if (!onSparkGetStatus) {
      res.json({ connected: false, error: SPARK_UNAVAILABLE });
      return;
    }
    res.json(onSparkGetStatus());
  });

  app.get(
    "/api/spark/auth",
    onSparkAuthStart
      ? (_req, res) => {
          res.redirect(307, onSparkAuthStart());
        }
      : respondWith(503, SPARK_UNAVAILABLE)
  );

  app.get(
    "/api/spark/callback",
    onSparkAuthCallback
      ? async (req, res) => {
          const { code } = req.query;
          if (typeof code !== "string" || code === "") {
            res.status(400).json({ error: "Missing authorization code" });
            return;
          }
          try {
            await onSparkAuthCallback(code);
          } catch (error) {
            log.warn({ err: error }, "Spark authorization failed");
            res.status(500).type("html").send(sparkFailedPage(errorMessage(error)));
            return;
          }
          res.type("html").send(sparkConnectedPage());
        }
      : respondWith(503, SPARK_UNAVAILABLE)
  );

  app.post(
    "/api/spark/disconnect",
    onSparkDisconnect
      ? async (_req, res) => {
          try {
            await onSparkDisconnect();
          } catch (error) {
            res.status(500).json({ error: errorMessage(error) });
            return;
          }
          res.json({ success: true });
        }
      : respondWith(503, SPARK_UNAVAILABLE)
  );

  // Upgrades never reach Express; anything else on the socket paths is refused.
  app.use("/ws", (_req, res) => {
    res.status(426).json({ error: "Upgrade Required" });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: `Invalid JSON: ${error.message}` });
      return;
    }
    log.error({ err: error }, "request failed");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

export interface DashboardServer {
  app: express.Express;
  server: http.Server;
  listen(port: number, host?: string): Promise<number>;
  close(): Promise<void>;
}

export function createDashboardServer(
  dashboard: Dashboard,
  options: AppOptions = {}
): DashboardServer {
  const log = ensureLogger(options.logger);
  const app = createApp(dashboard, options);
  const server = http.createServer(app);
  const gateway = new RealtimeGateway(server, dashboard, log);

  return {
    app,
    server,
    listen(port, host) {
      dashboard.start();
      return new Promise<number>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
          server.off("error", reject);
          const address = server.address();
          resolve(typeof address === "object" && address ? address.port : port);
        });
      });
    },
    async close() {
      await dashboard.stop();
      gateway.close();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}
