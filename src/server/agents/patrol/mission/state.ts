export type MissionState =
  | { kind: "starting" }
  | { kind: "patrolFinished" }
  | {
      kind: "goBack";
      /** Waypoint chosen from the selector; undefined when the value was invalid */
      destination: string | undefined;
      /** Set once the return plan succeeded and its fact was cleared */
      completed: boolean;
    };

export type MissionStateKind = MissionState["kind"];

