import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultConfig, loadConfig, parseConfig, resolveConfigPath } from "@server/world/config/index.js";
import { ConfigError } from "@shared/errors.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "patrol-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("parseConfig", () => {
    it("should fill every section with defaults", () => {
      const config = parseConfig({});

      expect(config.bridge.url).toBe("ws://localhost:9090");
      expect(config.topics).toEqual({ odometry: "/odom", selector: "aruco_marker_id", cmdVel: "/cmd_vel" });
      expect(config.navigation.reachedThreshold).toBe(0.3);
      expect(config.navigation.serverWaitAttempts).toBe(12);
      expect(config.mission.robot).toBe("r2d2");
      expect(config.mission.selectorTargets).toEqual(["wp1", "wp2", "wp3", "wp4"]);
      expect(config.actions.patrol.progressStep).toBe(0.1);
      expect(config.logging.level).toBe("info");
    });

    it("should keep overrides next to defaults", () => {
      const config = defaultConfig({ navigation: { reachedThreshold: 0.5 } });

      expect(config.navigation.reachedThreshold).toBe(0.5);
      expect(config.navigation.action).toBe("/navigate_to_pose");
    });

    it("should report the offending path", () => {
      expect(() => parseConfig({ navigation: { reachedThreshold: -1 } })).toThrow(ConfigError);
      expect(() => parseConfig({ navigation: { reachedThreshold: -1 } })).toThrow(
        "Invalid configuration: navigation.reachedThreshold: Number must be greater than 0",
      );
    });
  });

  describe("loadConfig", () => {
    it("should fall back to defaults when the default file is absent", () => {
      const config = loadConfig({ baseDir: dir, env: {} });
      expect(config.mission.home).toBe("wp_control");
    });

    it("should read the default file when present", () => {
      mkdirSync(join(dir, "config"));
      writeFileSync(join(dir, "config", "patrol.json"), JSON.stringify({ mission: { robot: "rover" } }));

      expect(loadConfig({ baseDir: dir, env: {} }).mission.robot).toBe("rover");
    });

    it("should honour PATROL_CONFIG", () => {
      writeFileSync(join(dir, "custom.json"), JSON.stringify({ logging: { level: "debug" } }));

      const config = loadConfig({ baseDir: dir, env: { PATROL_CONFIG: "custom.json" } });
      expect(config.logging.level).toBe("debug");
    });

    it("should fail when an explicit file is missing", () => {
      expect(() => loadConfig({ baseDir: dir, path: "nope.json", env: {} })).toThrow(
        `Config file not found: ${join(dir, "nope.json")}`,
      );
    });

    it("should fail on malformed JSON", () => {
      writeFileSync(join(dir, "broken.json"), "{ not json");
      expect(() => loadConfig({ baseDir: dir, path: "broken.json", env: {} })).toThrow(ConfigError);
    });
  });

  it("should resolve relative paths against the base directory", () => {
    expect(resolveConfigPath("pddl/patrol.pddl", "/srv/patrol")).toBe("/srv/patrol/pddl/patrol.pddl");
    expect(resolveConfigPath("/etc/patrol.json", "/srv/patrol")).toBe("/etc/patrol.json");
  });
});
