import { describe, it, expect, vi, beforeEach } from "vitest";
import { BridgeVelocityPublisher, Nav2MotionService, toStamp } from "@server/world/motion/nav2.js";
import { createPose } from "@shared/geometry/pose.js";
import { BridgeError } from "@shared/errors.js";
import { FakeBridge } from "../../helpers/fakes.js";
import { captureLogs } from "../../helpers/logger.js";

describe("Nav2MotionService", () => {
  let bridge: FakeBridge;
  let service: Nav2MotionService;

  beforeEach(() => {
    bridge = new FakeBridge();
    service = new Nav2MotionService(bridge, { logger: captureLogs().logger, now: () => 1500 });
  });

  describe("waitForServer", () => {
    it("should find the action server among the listed ones", async () => {
      bridge.respond = async () => ({ action_servers: ["/spin", "navigate_to_pose"] });

      expect(await service.waitForServer(500)).toBe(true);
      expect(bridge.serviceCalls[0].service).toBe("/rosapi/action_servers");
    });

    it("should report false when the server is not listed", async () => {
      bridge.respond = async () => ({ action_servers: ["/spin"] });
      expect(await service.waitForServer(500)).toBe(false);
    });

    it("should report false when the query fails", async () => {
      bridge.respond = async () => {
        throw new BridgeError("Service /rosapi/action_servers timed out after 500ms");
      };
      expect(await service.waitForServer(500)).toBe(false);
    });

    it("should report false on an unexpected response", async () => {
      bridge.respond = async () => ({ servers: "navigate_to_pose" });
      expect(await service.waitForServer(500)).toBe(false);
    });

    it("should give up when the bridge stays disconnected", async () => {
      bridge.connected = false;
      const offline = new Nav2MotionService(bridge, { logger: captureLogs().logger });

      expect(await offline.waitForServer(30)).toBe(false);
      expect(bridge.serviceCalls).toHaveLength(0);
    });

    it("should stop waiting for the bridge when the signal aborts", async () => {
      bridge.connected = false;
      const offline = new Nav2MotionService(bridge, { logger: captureLogs().logger });
      const abort = new AbortController();

      const wait = offline.waitForServer(60_000, abort.signal);
      abort.abort();

      expect(await wait).toBe(false);
      expect(bridge.serviceCalls).toHaveLength(0);
    });

    it("should pass the signal on to the action server query", async () => {
      bridge.respond = async () => ({ action_servers: ["/navigate_to_pose"] });
      const abort = new AbortController();

      expect(await service.waitForServer(500, abort.signal)).toBe(true);
      expect(bridge.serviceCalls[0].options).toEqual({ timeoutMs: 500, signal: abort.signal });
    });
  });

  describe("submitGoal", () => {
    it("should send a stamped NavigateToPose goal", () => {
      const target = createPose(6, 2);
      service.submitGoal(target);

      expect(bridge.goals).toHaveLength(1);
      expect(bridge.goals[0].action).toBe("/navigate_to_pose");
      expect(bridge.goals[0].actionType).toBe("nav2_msgs/action/NavigateToPose");
      expect(bridge.goals[0].args).toEqual({
        pose: { header: { frame_id: "map", stamp: { sec: 1, nanosec: 500000000 } }, pose: target },
        behavior_tree: "",
      });
    });

    it("should forward the remaining distance from feedback", () => {
      const onFeedback = vi.fn();
      service.submitGoal(createPose(1, 1), { onFeedback });

      bridge.goals[0].options.onFeedback?.({ distance_remaining: 3.5, navigation_time: {} });
      bridge.goals[0].options.onFeedback?.({ unexpected: true });

      expect(onFeedback).toHaveBeenCalledTimes(1);
      expect(onFeedback).toHaveBeenCalledWith(3.5);
    });

    it.each([
      { status: 4, result: true, expected: { outcome: "succeeded" } },
      { status: 5, result: false, expected: { outcome: "canceled" } },
      { status: 6, result: false, expected: { outcome: "aborted", message: "Navigation aborted" } },
      { status: undefined, result: true, expected: { outcome: "succeeded" } },
      { status: undefined, result: false, expected: { outcome: "rejected", message: "Navigation goal rejected" } },
    ])("should map status $status with result $result", async ({ status, result, expected }) => {
      const handle = service.submitGoal(createPose(1, 1));
      bridge.goals[0].result.resolve({ status, result, values: {} });

      await expect(handle.result).resolves.toEqual(expected);
    });

    it("should resolve transport failures as aborted", async () => {
      const handle = service.submitGoal(createPose(1, 1));
      bridge.goals[0].result.reject(new BridgeError("Bridge connection closed"));

      await expect(handle.result).resolves.toEqual({ outcome: "aborted", message: "Bridge connection closed" });
    });

    it("should cancel through the handle and the abort signal", () => {
      const controller = new AbortController();
      const first = service.submitGoal(createPose(1, 1));
      service.submitGoal(createPose(2, 2), { signal: controller.signal });

      first.cancel();
      controller.abort();

      expect(bridge.goals.map((goal) => goal.cancelled)).toEqual([true, true]);
    });
  });

  it("should split milliseconds into a stamp", () => {
    expect(toStamp(0)).toEqual({ sec: 0, nanosec: 0 });
    expect(toStamp(2250)).toEqual({ sec: 2, nanosec: 250000000 });
  });
});

describe("BridgeVelocityPublisher", () => {
  it("should publish a Twist on the configured topic", () => {
    const bridge = new FakeBridge();
    new BridgeVelocityPublisher(bridge, "/robot/cmd_vel").publish(0, 0.5);

    expect(bridge.published).toEqual([
      {
        topic: "/robot/cmd_vel",
        type: "geometry_msgs/msg/Twist",
        msg: { linear: { x: 0, y: 0, z: 0 }, angular: { x: 0, y: 0, z: 0.5 } },
      },
    ]);
  });
});
