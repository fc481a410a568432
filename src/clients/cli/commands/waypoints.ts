import { Command } from "commander";
import { loadConfig, resolveConfigPath } from "@server/world/config/index.js";
import { WaypointTable } from "@server/world/waypoints/table.js";
import { formatPose } from "@shared/geometry/pose.js";
import { outputJson, shouldOutputJson } from "../utils/json-output.js";
import { exitWithError } from "../utils/errors.js";

export function createWaypointsCommand(): Command {
  return new Command("waypoints")
    .description("List the waypoint table")
    .option("-c, --config <file>", "Config file (JSON)")
    .option("--json", "Output as JSON")
    .action((options: { config?: string; json?: boolean }) => {
      try {
        const config = loadConfig({ path: options.config });
        const table = WaypointTable.load(resolveConfigPath(config.waypointsFile));

        if (shouldOutputJson(options)) {
          outputJson({ frameId: table.frameId, waypoints: table.list() }, options);
          return;
        }

        if (table.list().length === 0) {
          console.log("No waypoints defined.");
          return;
        }
        console.log(`Waypoints (frame ${table.frameId}):`);
        for (const waypoint of table.list()) {
          console.log(`  ${waypoint.id.padEnd(12)} ${formatPose(waypoint.pose)}`);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
