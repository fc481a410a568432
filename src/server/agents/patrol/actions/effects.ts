import { fact } from "@server/world/knowledge/pddl.js";
import type { ActionEffectsFn } from "@server/world/execution/types.js";

/** (move ?r ?from ?to): the robot leaves ?from and ends at ?to */
export const moveEffects: ActionEffectsFn = ([robot, from, to]) => ({
  remove: robot && from ? [fact("robot_at", robot, from)] : [],
  add: robot && to ? [fact("robot_at", robot, to)] : [],
});

/** (patrol ?r ?wp): ?wp is marked patrolled */
export const patrolEffects: ActionEffectsFn = ([, waypoint]) => ({
  add: waypoint ? [fact("patrolled", waypoint)] : [],
});
