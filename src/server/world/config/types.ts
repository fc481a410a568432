import { z } from "zod";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const bridgeConfigSchema = z.object({
  url: z.string().url().default("ws://localhost:9090"),
  reconnectDelayMs: z.number().int().positive().default(2000),
  requestTimeoutMs: z.number().int().positive().default(5000),
});

export const topicsConfigSchema = z.object({
  odometry: z.string().default("/odom"),
  selector: z.string().default("aruco_marker_id"),
  cmdVel: z.string().default("/cmd_vel"),
});

export const navigationConfigSchema = z.object({
  action: z.string().default("/navigate_to_pose"),
  actionType: z.string().default("nav2_msgs/action/NavigateToPose"),
  frameId: z.string().default("map"),
  serverWaitTimeoutMs: z.number().int().positive().default(5000),
  serverWaitAttempts: z.number().int().positive().default(12),
  reachedThreshold: z.number().positive().default(0.3),
  /** 0 disables the pose silence check */
  poseTimeoutMs: z.number().int().nonnegative().default(10000),
});

export const plannerConfigSchema = z.object({
  command: z.string().default("ros2"),
  args: z.array(z.string()).default(["run", "popf", "popf"]),
  domainFile: z.string().default("pddl/patrol.pddl"),
  timeoutMs: z.number().int().positive().default(15000),
});

const connectionSchema = z.tuple([z.string(), z.string()]);

export const missionConfigSchema = z.object({
  robot: z.string().default("r2d2"),
  home: z.string().default("wp_control"),
  waypoints: z.array(z.string()).min(1).default(["wp_control", "wp1", "wp2", "wp3", "wp4"]),
  connections: z.array(connectionSchema).default([
    ["wp_control", "wp1"],
    ["wp1", "wp2"],
    ["wp2", "wp3"],
    ["wp3", "wp4"],
    ["wp4", "wp1"],
    ["wp4", "wp3"],
    ["wp3", "wp2"],
  ]),
  patrolWaypoints: z.array(z.string()).min(1).default(["wp1", "wp2", "wp3", "wp4"]),
  finalWaypoint: z.string().default("wp4"),
  /** Index is the selector value, entry is the destination */
  selectorTargets: z.array(z.string()).default(["wp1", "wp2", "wp3", "wp4"]),
  tickIntervalMs: z.number().int().positive().default(200),
});

export const actionsConfigSchema = z.object({
  tickIntervalMs: z.number().int().positive().default(100),
  patrol: z
    .object({
      tickIntervalMs: z.number().int().positive().default(1000),
      progressStep: z.number().positive().max(1).default(0.1),
      angularSpeed: z.number().default(0.5),
    })
    .default({}),
});

export const patrolConfigSchema = z.object({
  bridge: bridgeConfigSchema.default({}),
  topics: topicsConfigSchema.default({}),
  navigation: navigationConfigSchema.default({}),
  planner: plannerConfigSchema.default({}),
  mission: missionConfigSchema.default({}),
  actions: actionsConfigSchema.default({}),
  waypointsFile: z.string().default("config/waypoints.json"),
  logging: z
    .object({
      level: logLevelSchema.default("info"),
    })
    .default({}),
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;
export type TopicsConfig = z.infer<typeof topicsConfigSchema>;
export type NavigationConfig = z.infer<typeof navigationConfigSchema>;
export type PlannerConfig = z.infer<typeof plannerConfigSchema>;
export type MissionConfig = z.infer<typeof missionConfigSchema>;
export type ActionsConfig = z.infer<typeof actionsConfigSchema>;
export type PatrolConfig = z.infer<typeof patrolConfigSchema>;
export type PatrolConfigInput = z.input<typeof patrolConfigSchema>;
