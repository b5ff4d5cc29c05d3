import { randomBytes } from "node:crypto";

import { loadConfigFromEnvironment } from "../config";
import { Dashboard } from "../dashboard";
import { createConsoleLogger } from "../logger";
import { createDashboardServer } from "../server";
import { availableTools } from "../tools";

// Drives every hub with fake robot traffic so the dashboard can be tried
// without hardware.
async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const log = createConsoleLogger(config.LOG_LEVEL);

  let tuningMode = false;
  let tuningParams: Record<string, unknown> = { gain: 1, deadband: 0.05 };

  const dashboard = new Dashboard({
    logger: log,
    hooks: {
      onToolTrigger: async (name) => {
        if (!availableTools.some((tool) => tool.name === name)) {
          throw new Error(`Unknown tool: ${name}`);
        }
        return `${name} simulated`;
      },
      onGetTuningParams: () => ({ ...tuningParams, tuning_mode: tuningMode }),
      onSetTuningParams: (params) => {
        tuningParams = { ...tuningParams, ...params };
      },
      onSetTuningMode: (enabled) => {
        tuningMode = enabled;
      }
    }
  });
  const server = createDashboardServer(dashboard, {
    staticDir: config.STATIC_DIR,
    logger: log
  });

  const port = await server.listen(config.PORT, config.HOST);
  log.info({}, `Simulator dashboard on http://localhost:${port}`);

  dashboard.updateState((state) => {
    state.robot_connected = true;
    state.listening = true;
  });
  dashboard.addLog("info", "Simulator started");

  let tick = 0;
  const timer = setInterval(() => {
    tick += 1;
    const yaw = Math.sin(tick / 10) * 0.6;
    dashboard.updateState((state) => {
      state.head_yaw = Number(yaw.toFixed(3));
      state.face_position = Math.round(50 + yaw * 50);
      state.speaking = tick % 8 < 3;
    });
    if (tick % 5 === 0) {
      dashboard.addLog("face", `Face at ${Math.round(50 + yaw * 50)}%`);
    }
    if (tick % 12 === 0) {
      dashboard.addConversation("user", `Simulated question #${tick / 12}`);
      dashboard.addConversation("eva", `Simulated answer #${tick / 12}`);
    }
    dashboard.sendCameraFrame(randomBytes(2048));
  }, config.SIMULATE_INTERVAL_MS);

  const shutdown = async (): Promise<void> => {
    clearInterval(timer);
    try {
      await server.close();
    } catch (error) {
      log.error({ err: error }, "Server close failed");
    }
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown());
  process.once("SIGTERM", () => void shutdown());
}

main().catch((error) => {
  console.error("Simulator failed", error);
  process.exit(1);
});
