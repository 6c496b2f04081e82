import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { parseInputs, parseRunSeed, runFloorCli } from "../src/cli/floor.js";

const tempDirs: string[] = [];

const createTempDir = (): string => {
  const dir = mkdtempSync(join(tmpdir(), "gridheist-cli-"));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("argument parsing", () => {
  it("keeps integer seeds numeric", () => {
    expect(parseRunSeed("42")).toBe(42);
    expect(parseRunSeed("-7")).toBe(-7);
    expect(parseRunSeed("vault-7")).toBe("vault-7");
  });

  it("maps input tokens to actions", () => {
    expect(parseInputs("up, interact,wait")).toEqual({
      ok: true,
      actions: [{ type: "move", direction: "up" }, { type: "interact" }, { type: "wait" }],
    });
    expect(parseInputs("")).toEqual({ ok: true, actions: [] });
    expect(parseInputs("up,jump")).toEqual({
      ok: false,
      error: "Unknown input: jump. Expected one of up, down, left, right, wait, interact.",
    });
  });
});

describe("gridheist cli", () => {
  it("requires a command", () => {
    expect(runFloorCli([])).toEqual({
      code: 1,
      stdout: "",
      stderr:
        "Missing command. Usage: gridheist <gen|validate|play> [options]. Available: gen, validate, play.\n",
    });
    expect(runFloorCli(["dance"])).toEqual({
      code: 1,
      stdout: "",
      stderr: "Unknown command: dance.\n",
    });
  });

  it("generates a floor file that validates", () => {
    const dir = createTempDir();
    const generated = runFloorCli(["gen", "--seed", "42", "--out", "floors"], dir);
    expect(generated.code).toBe(0);
    expect(generated.stderr).toBe("");
    const lines = generated.stdout.trimEnd().split("\n");
    expect(lines[0]).toMatch(/^Generated floor 0 for seed 42 in \d+ attempt\(s\)\.$/);
    expect(lines[1]).toMatch(/^Layout hash: sha256:[0-9a-f]{64}$/);
    expect(lines[2]).toBe("#".repeat(24));
    expect(lines[lines.length - 1]).toBe(`Wrote ${join(dir, "floors", "floor-0.json")}`);

    const file: unknown = JSON.parse(readFileSync(join(dir, "floors", "floor-0.json"), "utf-8"));
    expect(file).toMatchObject({ schemaVersion: "0.1.0", floor: { runSeed: 42, floorIndex: 0 } });

    expect(runFloorCli(["validate", "--path", "floors/floor-0.json"], dir)).toEqual({
      code: 0,
      stdout: "Floor is valid.\n",
      stderr: "",
    });
  });

  it("prints the same floor for the same seed", () => {
    const first = runFloorCli(["gen", "--seed", "vault", "--floor", "1"]);
    const second = runFloorCli(["gen", "--seed", "vault", "--floor", "1"]);
    expect(first.code).toBe(0);
    expect(second.stdout).toBe(first.stdout);
  });

  it("generates negative floor indices", () => {
    const result = runFloorCli(["gen", "--seed", "42", "--floor", "-1"]);
    expect(result.code).toBe(0);
    expect(result.stderr).toBe("");
    expect(result.stdout.split("\n")[0]).toMatch(
      /^Generated floor -1 for seed 42 in \d+ attempt\(s\)\.$/,
    );
  });

  it("generates from a named preset", () => {
    const result = runFloorCli(["gen", "--seed", "7", "--preset", "sparse"]);
    expect(result.code).toBe(0);
    expect(result.stdout.split("\n")[2]).toBe("#".repeat(16));
    expect(runFloorCli(["gen", "--seed", "7", "--preset", "castle"])).toEqual({
      code: 1,
      stdout: "",
      stderr: "Unknown preset: castle. Available: sparse, standard, fortress.\n",
    });
  });

  it("reports validation failures", () => {
    const dir = createTempDir();
    writeFileSync(
      join(dir, "broken.json"),
      JSON.stringify({ floor: { grid: { width: 5, height: 5, tiles: [] } } }),
      "utf-8",
    );
    const result = runFloorCli(["validate", "--path", "broken.json"], dir);
    expect(result.code).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr.startsWith("Floor validation failed:\n- ")).toBe(true);
  });

  it("reports missing flags", () => {
    expect(runFloorCli(["gen"]).stderr).toBe("Missing --seed.\n");
    expect(runFloorCli(["gen", "--seed", "1", "--floor", "1abc"]).stderr).toBe("Invalid --floor.\n");
    expect(runFloorCli(["gen", "--seed", "1", "--floor", "1.5"]).stderr).toBe("Invalid --floor.\n");
    expect(runFloorCli(["validate"]).stderr).toBe("Missing --path.\n");
    expect(runFloorCli(["play", "--seed", "1", "--inputs", "up,fly"])).toEqual({
      code: 1,
      stdout: "",
      stderr: "Unknown input: fly. Expected one of up, down, left, right, wait, interact.\n",
    });
  });

  it("reports config errors", () => {
    const dir = createTempDir();
    writeFileSync(join(dir, "run.json"), JSON.stringify({ width: 2 }), "utf-8");
    expect(runFloorCli(["gen", "--seed", "1", "--config", "run.json"], dir)).toEqual({
      code: 1,
      stdout: "",
      stderr: "[config] width: Number must be greater than or equal to 5\n",
    });
  });

  it("plays scripted inputs and prints the run snapshot", () => {
    const dir = createTempDir();
    const result = runFloorCli(
      ["play", "--seed", "42", "--inputs", "wait,wait", "--events", "out/events.jsonl"],
      dir,
    );
    expect(result.code).toBe(0);
    expect(result.stderr).toBe("");
    const lines = result.stdout.trimEnd().split("\n");
    expect(lines.slice(-3)).toEqual([
      "Steps: 2 (0 rejected)",
      '{"floorIndex":0,"inventory":{"keycard":0,"objective":0},"runSeed":42,"score":0,"status":"playing","turnCount":2}',
      `Wrote ${join(dir, "out", "events.jsonl")}`,
    ]);

    const events = readFileSync(join(dir, "out", "events.jsonl"), "utf-8")
      .trimEnd()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(events.at(-1)).toMatchObject({ type: "TurnCompleted", turn: 2, floorIndex: 0 });
  });
});
