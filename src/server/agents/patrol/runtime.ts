/**
 * Wires the patrol agent: feeds, action executors, execution engine and the
 * mission controller, all on top of one bridge connection.
 */

import type { Logger } from "pino";
import type { Pose } from "@shared/geometry/pose.js";
import { LatestValue } from "@shared/utils/latest.js";
import { ConfigError } from "@shared/errors.js";
import type { PatrolConfig } from "@server/world/config/types.js";
import { resolveConfigPath } from "@server/world/config/index.js";
import type { BridgeTransport } from "@server/world/communication/bridge/types.js";
import { subscribePoseFeed, subscribeSelectorFeed } from "@server/world/communication/feeds.js";
import { PlanExecutor } from "@server/world/execution/executor.js";
import { ActionRegistry } from "@server/world/execution/registry.js";
import { InMemoryKnowledgeStore } from "@server/world/knowledge/store.js";
import { createLogger } from "@server/world/logging/logger.js";
import { BridgeVelocityPublisher, Nav2MotionService } from "@server/world/motion/nav2.js";
import type { MotionService, VelocityPublisher } from "@server/world/motion/types.js";
import { PopfPlanningService, ProcessPlanSolver } from "@server/world/planning/popf.js";
import type { PlanSolver } from "@server/world/planning/types.js";
import { Ticker } from "@server/world/runtime/ticker.js";
import { WaypointTable } from "@server/world/waypoints/table.js";
import { MoveAction } from "./actions/move.js";
import { PatrolAction } from "./actions/patrol.js";
import { moveEffects, patrolEffects } from "./actions/effects.js";
import { MissionController } from "./mission/controller.js";
import { referencedWaypoints } from "./mission/knowledge.js";

export interface PatrolRuntimeDeps {
  bridge: BridgeTransport;
  /** Defaults to the table named by config.waypointsFile */
  waypoints?: WaypointTable;
  solver?: PlanSolver;
  motion?: MotionService;
  velocity?: VelocityPublisher;
  baseDir?: string;
  logger?: Logger;
}

export interface PatrolRuntime {
  readonly controller: MissionController;
  readonly engine: PlanExecutor;
  readonly registry: ActionRegistry;
  readonly knowledge: InMemoryKnowledgeStore;
  readonly waypoints: WaypointTable;
  readonly pose: LatestValue<Pose>;
  readonly selector: LatestValue<number>;
  start(): Promise<void>;
  stop(): void;
}

export function checkWaypoints(config: PatrolConfig, waypoints: WaypointTable): void {
  const missing = waypoints.missing(referencedWaypoints(config.mission));
  if (missing.length > 0) {
    throw new ConfigError(`Mission references waypoints missing from the table: ${missing.join(", ")}`);
  }
}

export function createPatrolRuntime(config: PatrolConfig, deps: PatrolRuntimeDeps): PatrolRuntime {
  const logger = deps.logger;
  const child = (tag: string): Logger => createLogger(tag, logger);
  const baseDir = deps.baseDir ?? process.cwd();

  const waypoints = deps.waypoints ?? WaypointTable.load(resolveConfigPath(config.waypointsFile, baseDir));
  checkWaypoints(config, waypoints);

  const knowledge = new InMemoryKnowledgeStore();
  const planning = new PopfPlanningService({
    domainFile: resolveConfigPath(config.planner.domainFile, baseDir),
    knowledge,
    solver: deps.solver ?? new ProcessPlanSolver(config.planner),
    logger: child("Planner"),
  });

  const motion = deps.motion ?? new Nav2MotionService(deps.bridge, {
    action: config.navigation.action,
    actionType: config.navigation.actionType,
    frameId: config.navigation.frameId,
    logger: child("Nav2"),
  });
  const velocity = deps.velocity ?? new BridgeVelocityPublisher(deps.bridge, config.topics.cmdVel);

  const registry = new ActionRegistry();
  registry.register(
    new MoveAction({
      waypoints,
      motion,
      reachedThreshold: config.navigation.reachedThreshold,
      serverWaitTimeoutMs: config.navigation.serverWaitTimeoutMs,
      serverWaitAttempts: config.navigation.serverWaitAttempts,
      poseTimeoutMs: config.navigation.poseTimeoutMs,
      logger: child("Move"),
    }),
    { intervalMs: config.actions.tickIntervalMs, effects: moveEffects },
  );
  registry.register(
    new PatrolAction({
      velocity,
      progressStep: config.actions.patrol.progressStep,
      angularSpeed: config.actions.patrol.angularSpeed,
      logger: child("Patrol"),
    }),
    { intervalMs: config.actions.patrol.tickIntervalMs, effects: patrolEffects },
  );

  const engine = new PlanExecutor({ registry, knowledge, logger: child("Executor") });
  const pose = new LatestValue<Pose>();
  const selector = new LatestValue<number>();
  const missionLogger = child("Mission");
  const controller = new MissionController({
    mission: config.mission,
    knowledge,
    planning,
    engine,
    selector,
    logger: missionLogger,
  });
  const ticker = new Ticker(() => controller.tick(), {
    name: "mission",
    intervalMs: config.mission.tickIntervalMs,
    logger: missionLogger,
  });

  const cleanups: Array<() => void> = [];

  return {
    controller,
    engine,
    registry,
    knowledge,
    waypoints,
    pose,
    selector,
    async start() {
      const feedLogger = child("Feeds");
      cleanups.push(pose.subscribe((snapshot) => registry.broadcastPose(snapshot.value)));
      cleanups.push(subscribePoseFeed(deps.bridge, config.topics.odometry, pose, feedLogger));
      cleanups.push(subscribeSelectorFeed(deps.bridge, config.topics.selector, selector, feedLogger));
      await controller.init();
      ticker.start();
    },
    stop() {
      ticker.stop();
      controller.stop();
      while (cleanups.length > 0) {
        cleanups.pop()?.();
      }
    },
  };
}
