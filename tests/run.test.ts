import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { createSeekerAgent } from "../src/agents/seekerAgent.js";
import type { SimEvent } from "../src/contract/types.js";
import { createFloorStream } from "../src/core/rng.js";
import {
  RunConfigSchema,
  loadRunConfig,
  parseRunConfig,
  resolveFloorParams,
} from "../src/engine/runConfig.js";
import { createRunController, parseRunSnapshot } from "../src/engine/runController.js";
import { runFloor } from "../src/engine/runFloor.js";
import { generateFloorFromStream, hashLayout } from "../src/games/stealth/generator.js";
import { initializeFloor } from "../src/scenarios/stealth/index.js";

const createTempDir = (): string => mkdtempSync(join(tmpdir(), "gridheist-run-"));

/** No guards, doors or hazards: every floor is a straight walk. */
const quietRun = { guardCount: 0, guardRamp: 0, doorRamp: 0, hazardCount: 0 };

describe("run config", () => {
  it("fills every field from defaults", () => {
    const config = RunConfigSchema.parse({});
    expect(config.width).toBe(24);
    expect(config.height).toBe(14);
    expect(config.wallDensity).toBe(0.18);
    expect(config.maxAttempts).toBe(200);
    expect(config.floorCount).toBe(3);
    expect(config.guards).toEqual({
      visionRange: 6,
      chaseDuration: 5,
      alertDuration: 4,
      hazardAlertRadius: 5,
      terrainAwarePursuit: false,
    });
    expect(config.scoring).toEqual({ keycard: 10, objective: 100, floorCleared: 250 });
  });

  it("ramps guards and doors with depth", () => {
    const config = RunConfigSchema.parse({});
    expect(resolveFloorParams(config, 0)).toMatchObject({ guardCount: 1, doorCount: 0 });
    expect(resolveFloorParams(config, 2)).toMatchObject({ guardCount: 3, doorCount: 2 });
  });

  it("formats schema issues with their path", () => {
    expect(parseRunConfig({ guards: { visionRange: 0 } })).toEqual({
      ok: false,
      errors: ["guards.visionRange: Number must be greater than 0"],
    });
  });

  it("loads config files", () => {
    const dir = createTempDir();
    const good = join(dir, "good.json");
    const bad = join(dir, "bad.json");
    const broken = join(dir, "broken.json");
    writeFileSync(good, JSON.stringify({ floorCount: 2, width: 16 }), "utf-8");
    writeFileSync(bad, JSON.stringify({ width: 2 }), "utf-8");
    writeFileSync(broken, "{ not json", "utf-8");

    const loaded = loadRunConfig(good);
    expect(loaded.ok).toBe(true);
    if (loaded.ok) {
      expect(loaded.value.floorCount).toBe(2);
      expect(loaded.value.width).toBe(16);
      expect(loaded.value.height).toBe(14);
    }
    expect(loadRunConfig(bad)).toEqual({
      ok: false,
      errors: ["[config] width: Number must be greater than or equal to 5"],
    });

    const unparsable = loadRunConfig(broken);
    expect(unparsable.ok).toBe(false);
    if (!unparsable.ok) {
      expect(unparsable.errors[0]).toMatch(/^\[config\] .*broken\.json is not valid JSON: /);
    }

    const missing = loadRunConfig(join(dir, "missing.json"));
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.errors[0]).toMatch(/^\[config\] cannot read /);
    }
    rmSync(dir, { recursive: true, force: true });
  });
});

describe("run controller", () => {
  it("seeds each floor from the run seed", () => {
    const started = createRunController({}, 42);
    if (!started.ok) {
      throw new Error(started.reason);
    }
    const run = started.value;
    expect(run.floors.map((floor) => floor.combinedSeed)).toEqual([42, 43, 40]);
    expect(run.snapshot()).toEqual({
      runSeed: 42,
      floorIndex: 0,
      turnCount: 0,
      inventory: { keycard: 0, objective: 0 },
      score: 0,
      status: "playing",
    });
  });

  it("sets up guards from the stream that generated the floor", () => {
    const started = createRunController({ guardCount: 3 }, 42);
    if (!started.ok) {
      throw new Error(started.reason);
    }
    const run = started.value;
    const stream = createFloorStream(42, 0);
    const outcome = generateFloorFromStream(resolveFloorParams(run.config, 0), stream, {
      runSeed: 42,
      floorIndex: 0,
    });
    if (!outcome.ok) {
      throw new Error(outcome.reason);
    }
    expect(hashLayout(outcome.value)).toBe(hashLayout(run.floors[0]));
    const setup = initializeFloor(outcome.value, stream);
    expect(run.view().guards).toEqual(
      setup.guards.map(({ guard }) => ({
        id: guard.id,
        position: guard.position,
        facing: guard.facing,
        mode: "patrol",
      })),
    );
  });

  it("draws a cosmetic seed for blank input", () => {
    const started = createRunController({ floorCount: 1 }, "   ");
    expect(started.ok).toBe(true);
    if (started.ok) {
      expect(typeof started.value.runSeed).toBe("number");
    }
  });

  it("reports invalid config before generating", () => {
    const started = createRunController({ floorCount: 0 }, 42);
    expect(started).toEqual({
      ok: false,
      code: "config_invalid",
      reason: "Invalid run config: floorCount: Number must be greater than 0",
      errors: ["floorCount: Number must be greater than 0"],
    });
  });

  it("reports which floor could not be generated", () => {
    const started = createRunController({ wallDensity: 1, maxAttempts: 3 }, 42);
    expect(started).toMatchObject({
      ok: false,
      code: "generation_exhausted",
      floorIndex: 0,
      attemptCount: 3,
    });
  });

  it("advances through every floor and totals the run", () => {
    const started = createRunController(quietRun, 42);
    if (!started.ok) {
      throw new Error(started.reason);
    }
    const run = started.value;
    const wins: SimEvent[] = [];
    run.subscribe((event) => {
      if (event.type === "FloorWon") {
        wins.push(event);
      }
    });

    const result = runFloor(run, createSeekerAgent(), { maxSteps: 5000 });
    expect(result.status).toBe("won");
    expect(result.rejected).toBe(0);
    expect(wins.map((event) => event.floorIndex)).toEqual([0, 1, 2]);
    expect(run.floorIndex()).toBe(2);
    expect(run.snapshot()).toEqual({
      runSeed: 42,
      floorIndex: 2,
      turnCount: result.steps,
      inventory: { keycard: 0, objective: 3 },
      score: 1050,
      status: "won",
    });
  });

  it("round-trips snapshots through JSON", () => {
    const started = createRunController(quietRun, "vault");
    if (!started.ok) {
      throw new Error(started.reason);
    }
    started.value.submit({ type: "wait" });
    const snapshot = started.value.snapshot();
    expect(parseRunSnapshot(JSON.parse(JSON.stringify(snapshot)))).toEqual({
      ok: true,
      value: snapshot,
    });
  });

  it("accepts the empty string as a saved run seed", () => {
    expect(
      parseRunSnapshot({
        runSeed: "",
        floorIndex: 0,
        turnCount: 0,
        inventory: { keycard: 0, objective: 0 },
        score: 0,
        status: "playing",
      }).ok,
    ).toBe(true);
  });

  it("rejects malformed snapshots", () => {
    const parsed = parseRunSnapshot({
      runSeed: 1,
      floorIndex: 0,
      turnCount: 0,
      inventory: { keycard: 0, objective: 0 },
      score: 0,
      status: "paused",
    });
    expect(parsed.ok).toBe(false);
  });
});
