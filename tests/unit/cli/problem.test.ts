import { describe, it, expect } from "vitest";
import { renderInitialProblem } from "@clients/cli/commands/problem.js";
import { defaultConfig } from "@server/world/config/index.js";

describe("problem command", () => {
  it("should render the seeded patrol problem", async () => {
    const config = defaultConfig({
      mission: {
        waypoints: ["base", "north"],
        home: "base",
        connections: [["base", "north"]],
        patrolWaypoints: ["north"],
        finalWaypoint: "north",
        selectorTargets: ["base"],
      },
    });

    expect(await renderInitialProblem(config)).toBe(
      [
        "(define (problem patrol_problem)",
        "  (:domain patrol)",
        "  (:objects",
        "    r2d2 - robot",
        "    base north - waypoint",
        "  )",
        "  (:init",
        "    (robot_at r2d2 base)",
        "    (connected base north)",
        "  )",
        "  (:goal (and (robot_at r2d2 north) (patrolled north)))",
        ")",
        "",
      ].join("\n"),
    );
  });
});
