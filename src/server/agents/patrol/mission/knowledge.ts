/**
 * Mission vocabulary: the facts the controller seeds and the goals it sets
 */

import type { KnowledgeStore } from "@server/world/knowledge/types.js";
import { conjunction, fact } from "@server/world/knowledge/pddl.js";
import type { MissionConfig } from "@server/world/config/types.js";

export type MissionDefinition = Omit<MissionConfig, "tickIntervalMs">;

export async function seedKnowledge(store: KnowledgeStore, mission: MissionDefinition): Promise<void> {
  await store.addInstance(mission.robot, "robot");
  for (const waypoint of mission.waypoints) {
    await store.addInstance(waypoint, "waypoint");
  }

  await store.addPredicate(robotAt(mission, mission.home));
  for (const [from, to] of mission.connections) {
    await store.addPredicate(fact("connected", from, to));
  }
}

export function robotAt(mission: MissionDefinition, waypoint: string): string {
  return fact("robot_at", mission.robot, waypoint);
}

export function patrolledFacts(mission: MissionDefinition): string[] {
  return mission.patrolWaypoints.map((waypoint) => fact("patrolled", waypoint));
}

/** Visit every patrol waypoint and end at the final one */
export function patrolGoal(mission: MissionDefinition): string {
  return conjunction([robotAt(mission, mission.finalWaypoint), ...patrolledFacts(mission)]);
}

export function destinationGoal(mission: MissionDefinition, waypoint: string): string {
  return conjunction([robotAt(mission, waypoint)]);
}

/**
 * Destination for a selector value, or undefined when the value is missing or unmapped
 */
export function selectDestination(mission: MissionDefinition, value: number | undefined): string | undefined {
  if (value === undefined || !Number.isInteger(value) || value < 0) {
    return undefined;
  }
  return mission.selectorTargets[value];
}

/**
 * Every waypoint id the mission can ever reference
 */
export function referencedWaypoints(mission: MissionDefinition): string[] {
  const ids = new Set<string>([
    mission.home,
    mission.finalWaypoint,
    ...mission.waypoints,
    ...mission.patrolWaypoints,
    ...mission.selectorTargets,
  ]);
  for (const [from, to] of mission.connections) {
    ids.add(from);
    ids.add(to);
  }
  return Array.from(ids);
}
