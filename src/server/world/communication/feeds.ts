/**
 * Pose and selector feeds: bridge topics decoded into last-write-wins cells
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { Pose } from "@shared/geometry/pose.js";
import type { LatestValue } from "@shared/utils/latest.js";
import type { BridgeTransport } from "./bridge/types.js";

const pointSchema = z.object({ x: z.number(), y: z.number(), z: z.number() });
const quaternionSchema = z.object({ x: z.number(), y: z.number(), z: z.number(), w: z.number() });

/** nav_msgs/Odometry, only the pose part */
export const odometrySchema = z.object({
  pose: z.object({
    pose: z.object({
      position: pointSchema,
      orientation: quaternionSchema,
    }),
  }),
});

/** std_msgs/Int32 */
export const int32Schema = z.object({
  data: z.number().int(),
});

export function decodeOdometry(msg: unknown): Pose | undefined {
  const parsed = odometrySchema.safeParse(msg);
  if (!parsed.success) {
    return undefined;
  }
  const { position, orientation } = parsed.data.pose.pose;
  return {
    position: { x: position.x, y: position.y, z: position.z },
    orientation: { x: orientation.x, y: orientation.y, z: orientation.z, w: orientation.w },
  };
}

export function decodeInt32(msg: unknown): number | undefined {
  const parsed = int32Schema.safeParse(msg);
  return parsed.success ? parsed.data.data : undefined;
}

export function subscribePoseFeed(
  bridge: BridgeTransport,
  topic: string,
  target: LatestValue<Pose>,
  logger: Logger,
): () => void {
  return bridge.subscribe(topic, "nav_msgs/msg/Odometry", (msg) => {
    const pose = decodeOdometry(msg);
    if (!pose) {
      logger.warn({ topic }, "Ignored malformed odometry message");
      return;
    }
    target.set(pose);
  });
}

export function subscribeSelectorFeed(
  bridge: BridgeTransport,
  topic: string,
  target: LatestValue<number>,
  logger: Logger,
): () => void {
  return bridge.subscribe(topic, "std_msgs/msg/Int32", (msg) => {
    const value = decodeInt32(msg);
    if (value === undefined) {
      logger.warn({ topic }, "Ignored malformed selector message");
      return;
    }
    logger.info(`Received value: ${value}`);
    target.set(value);
  });
}
