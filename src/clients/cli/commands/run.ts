import { Command } from "commander";
import { loadConfig } from "@server/world/config/index.js";
import { RosbridgeClient } from "@server/world/communication/bridge/client.js";
import { configureLogger, createLogger } from "@server/world/logging/logger.js";
import { createPatrolRuntime } from "@server/agents/patrol/runtime.js";
import { errorMessage } from "@shared/errors.js";
import { exitWithError } from "../utils/errors.js";

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function createRunCommand(): Command {
  return new Command("run")
    .description("Run the patrol mission against a rosbridge server")
    .option("-c, --config <file>", "Config file (JSON)")
    .option("--url <url>", "rosbridge WebSocket URL (overrides config)")
    .action(async (options: { config?: string; url?: string }) => {
      let bridge: RosbridgeClient | undefined;
      try {
        const config = loadConfig({ path: options.config });
        const root = configureLogger({ level: config.logging.level });
        const logger = createLogger("Patrol", root);

        bridge = new RosbridgeClient({
          url: options.url ?? config.bridge.url,
          reconnectDelayMs: config.bridge.reconnectDelayMs,
          requestTimeoutMs: config.bridge.requestTimeoutMs,
          logger: createLogger("Bridge", root),
        });
        try {
          await bridge.connect();
        } catch (error) {
          // The client keeps reconnecting; actions wait for the servers themselves
          logger.warn(`Bridge not reachable yet: ${errorMessage(error)}`);
        }

        const runtime = createPatrolRuntime(config, { bridge, logger: root });
        await runtime.start();
        logger.info(`Mission running (robot ${config.mission.robot}, home ${config.mission.home})`);

        const signal = await waitForShutdown();
        logger.info(`Received ${signal}, shutting down`);
        runtime.stop();
        await bridge.close();
      } catch (error) {
        await bridge?.close();
        exitWithError(error);
      }
    });
}
