import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Pose } from "@shared/geometry/pose.js";
import { ConfigError, MissingWaypointError, errorMessage } from "@shared/errors.js";

export interface Waypoint {
  readonly id: string;
  readonly pose: Readonly<Pose>;
}

const pointSchema = z.object({ x: z.number(), y: z.number(), z: z.number().default(0) });
const quaternionSchema = z.object({
  x: z.number().default(0),
  y: z.number().default(0),
  z: z.number().default(0),
  w: z.number().default(1),
});

export const waypointFileSchema = z.object({
  frameId: z.string().default("map"),
  waypoints: z.array(
    z.object({
      id: z.string().min(1),
      position: pointSchema,
      orientation: quaternionSchema.default({}),
    }),
  ),
});

export type WaypointFile = z.input<typeof waypointFileSchema>;

/**
 * Named poses, fixed once loaded
 */
export class WaypointTable {
  private readonly waypoints: ReadonlyMap<string, Waypoint>;

  constructor(waypoints: Iterable<Waypoint>, readonly frameId: string = "map") {
    const byId = new Map<string, Waypoint>();
    for (const waypoint of waypoints) {
      if (byId.has(waypoint.id)) {
        throw new ConfigError(`Duplicate waypoint "${waypoint.id}"`);
      }
      byId.set(waypoint.id, Object.freeze({
        id: waypoint.id,
        pose: Object.freeze({
          position: Object.freeze({ ...waypoint.pose.position }),
          orientation: Object.freeze({ ...waypoint.pose.orientation }),
        }),
      }));
    }
    this.waypoints = byId;
  }

  static fromJSON(input: unknown): WaypointTable {
    const result = waypointFileSchema.safeParse(input);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new ConfigError(`Invalid waypoint file: ${issues}`);
    }
    return new WaypointTable(
      result.data.waypoints.map((entry) => ({
        id: entry.id,
        pose: { position: entry.position, orientation: entry.orientation },
      })),
      result.data.frameId,
    );
  }

  static load(file: string): WaypointTable {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Failed to read waypoints from ${file}: ${errorMessage(error)}`, { cause: error });
    }
    return WaypointTable.fromJSON(raw);
  }

  has(id: string): boolean {
    return this.waypoints.has(id);
  }

  /**
   * @throws MissingWaypointError when the id is not in the table
   */
  get(id: string): Waypoint {
    const waypoint = this.waypoints.get(id);
    if (!waypoint) {
      throw new MissingWaypointError(id);
    }
    return waypoint;
  }

  find(id: string): Waypoint | undefined {
    return this.waypoints.get(id);
  }

  ids(): string[] {
    return Array.from(this.waypoints.keys());
  }

  list(): Waypoint[] {
    return Array.from(this.waypoints.values());
  }

  /**
   * Ids from `referenced` that the table does not contain
   */
  missing(referenced: Iterable<string>): string[] {
    const absent = new Set<string>();
    for (const id of referenced) {
      if (!this.waypoints.has(id)) {
        absent.add(id);
      }
    }
    return Array.from(absent);
  }
}
