import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { createScriptedAgent } from "../agents/scriptedAgent.js";
import type { RunSeed } from "../contract/types.js";
import { stableStringify, toStableJsonl } from "../core/json.js";
import { createRunController } from "../engine/runController.js";
import { loadRunConfig, resolveFloorParams, RunConfigSchema, type RunConfig } from "../engine/runConfig.js";
import { runFloor } from "../engine/runFloor.js";
import { generateFloor, hashLayout } from "../games/stealth/generator.js";
import {
  FLOOR_PRESETS,
  isFloorPreset,
  type FloorParamsInput,
} from "../games/stealth/generatorTypes.js";
import { LEGEND, renderGrid } from "../games/stealth/render.js";
import type { GenerationResult, PlayerAction } from "../games/stealth/types.js";
import { validateFloor } from "../games/stealth/validator.js";

interface FloorFile {
  schemaVersion: "0.1.0";
  layoutHash: string;
  floor: GenerationResult;
}

interface FloorCliResult {
  code: number;
  stdout: string;
  stderr: string;
}

const USAGE = "Usage: gridheist <gen|validate|play> [options]. Available: gen, validate, play.";

const writeLine = (buffer: string[], line: string): void => {
  buffer.push(line.endsWith("\n") ? line : `${line}\n`);
};

/** Integer text is used verbatim; anything else is hashed as a text seed. */
export const parseRunSeed = (value: string): RunSeed =>
  /^-?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : value;

const ACTION_TOKENS: Record<string, PlayerAction> = {
  up: { type: "move", direction: "up" },
  down: { type: "move", direction: "down" },
  left: { type: "move", direction: "left" },
  right: { type: "move", direction: "right" },
  wait: { type: "wait" },
  interact: { type: "interact" },
};

export const parseInputs = (
  value: string,
): { ok: true; actions: PlayerAction[] } | { ok: false; error: string } => {
  const actions: PlayerAction[] = [];
  for (const token of value.split(",").map((part) => part.trim()).filter(Boolean)) {
    const action = ACTION_TOKENS[token];
    if (!action) {
      return {
        ok: false,
        error: `Unknown input: ${token}. Expected one of ${Object.keys(ACTION_TOKENS).join(", ")}.`,
      };
    }
    actions.push(action);
  }
  return { ok: true, actions };
};

const readFlags = (argv: string[]): Map<string, string> => {
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--") && i + 1 < argv.length) {
      flags.set(arg.slice(2), argv[++i]);
    }
  }
  return flags;
};

const resolveConfig = (
  cwd: string,
  configPath: string | undefined,
): { ok: true; value: RunConfig } | { ok: false; errors: string[] } =>
  configPath ? loadRunConfig(resolve(cwd, configPath)) : { ok: true, value: RunConfigSchema.parse({}) };

const readFloorFile = (path: string): unknown => {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (parsed && typeof parsed === "object" && "floor" in parsed) {
    return parsed.floor;
  }
  return parsed;
};

function runGen(argv: string[], cwd: string, stdout: string[], stderr: string[]): number {
  const flags = readFlags(argv);
  const seedText = flags.get("seed");
  if (seedText === undefined || seedText.trim() === "") {
    writeLine(stderr, "Missing --seed.");
    return 1;
  }
  const floorText = flags.get("floor") ?? "0";
  if (!/^-?\d+$/.test(floorText.trim())) {
    writeLine(stderr, "Invalid --floor.");
    return 1;
  }
  const floorIndex = Number.parseInt(floorText, 10);
  const presetName = flags.get("preset");
  let params: FloorParamsInput;
  if (presetName !== undefined) {
    if (!isFloorPreset(presetName)) {
      writeLine(
        stderr,
        `Unknown preset: ${presetName}. Available: ${Object.keys(FLOOR_PRESETS).join(", ")}.`,
      );
      return 1;
    }
    params = FLOOR_PRESETS[presetName];
  } else {
    const config = resolveConfig(cwd, flags.get("config"));
    if (!config.ok) {
      for (const error of config.errors) {
        writeLine(stderr, error);
      }
      return 1;
    }
    params = resolveFloorParams(config.value, floorIndex);
  }

  const runSeed = parseRunSeed(seedText);
  const outcome = generateFloor(params, runSeed, floorIndex);
  if (!outcome.ok) {
    writeLine(stderr, `${outcome.code}: ${outcome.reason}`);
    return 1;
  }
  const floor = outcome.value;
  const layoutHash = hashLayout(floor);

  writeLine(
    stdout,
    `Generated floor ${floorIndex} for seed ${String(runSeed)} in ${floor.attemptCount} attempt(s).`,
  );
  writeLine(stdout, `Layout hash: ${layoutHash}`);
  for (const line of renderGrid(floor.grid, {
    start: floor.start,
    guards: floor.guardSpawns.map((position) => ({ position, mode: "patrol" })),
  })) {
    writeLine(stdout, line);
  }
  writeLine(stdout, LEGEND);

  const outDir = flags.get("out");
  if (outDir) {
    const file: FloorFile = { schemaVersion: "0.1.0", layoutHash, floor };
    const outputPath = resolve(cwd, outDir, `floor-${floorIndex}.json`);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, `${stableStringify(file)}\n`, "utf-8");
    writeLine(stdout, `Wrote ${outputPath}`);
  }
  return 0;
}

function runValidate(argv: string[], cwd: string, stdout: string[], stderr: string[]): number {
  const path = readFlags(argv).get("path");
  if (!path) {
    writeLine(stderr, "Missing --path.");
    return 1;
  }
  const validation = validateFloor(readFloorFile(resolve(cwd, path)));
  if (!validation.ok) {
    writeLine(stderr, "Floor validation failed:");
    for (const error of validation.errors) {
      writeLine(stderr, `- ${error.code}: ${error.message}`);
    }
    return 1;
  }
  writeLine(stdout, "Floor is valid.");
  return 0;
}

function runPlay(argv: string[], cwd: string, stdout: string[], stderr: string[]): number {
  const flags = readFlags(argv);
  const seedText = flags.get("seed");
  if (seedText === undefined || seedText.trim() === "") {
    writeLine(stderr, "Missing --seed.");
    return 1;
  }
  const inputs = parseInputs(flags.get("inputs") ?? "");
  if (!inputs.ok) {
    writeLine(stderr, inputs.error);
    return 1;
  }
  const config = resolveConfig(cwd, flags.get("config"));
  if (!config.ok) {
    for (const error of config.errors) {
      writeLine(stderr, error);
    }
    return 1;
  }

  const started = createRunController(config.value, parseRunSeed(seedText));
  if (!started.ok) {
    writeLine(stderr, `${started.code}: ${started.reason}`);
    return 1;
  }
  const run = started.value;
  const result = runFloor(run, createScriptedAgent(inputs.actions), {
    maxSteps: inputs.actions.length,
  });

  const view = run.view();
  for (const line of renderGrid(view.grid, {
    player: view.player.position,
    guards: view.guards,
  })) {
    writeLine(stdout, line);
  }
  writeLine(stdout, `Steps: ${result.steps} (${result.rejected} rejected)`);
  writeLine(stdout, stableStringify(run.snapshot()));

  const eventsPath = flags.get("events");
  if (eventsPath) {
    const outputPath = resolve(cwd, eventsPath);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, result.events.length > 0 ? toStableJsonl(result.events) : "", "utf-8");
    writeLine(stdout, `Wrote ${outputPath}`);
  }
  return 0;
}

export function runFloorCli(argv: string[], cwd = process.cwd()): FloorCliResult {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const command = argv[0];

  if (!command) {
    writeLine(stderr, `Missing command. ${USAGE}`);
    return { code: 1, stdout: stdout.join(""), stderr: stderr.join("") };
  }

  const handlers: Record<string, typeof runGen> = {
    gen: runGen,
    validate: runValidate,
    play: runPlay,
  };
  const handler = handlers[command];
  if (!handler) {
    writeLine(stderr, `Unknown command: ${command}.`);
    return { code: 1, stdout: stdout.join(""), stderr: stderr.join("") };
  }

  try {
    const code = handler(argv.slice(1), cwd, stdout, stderr);
    return { code, stdout: stdout.join(""), stderr: stderr.join("") };
  } catch (error) {
    writeLine(stderr, error instanceof Error ? error.message : `Failed to run ${command}.`);
    return { code: 1, stdout: stdout.join(""), stderr: stderr.join("") };
  }
}

function main(): void {
  const result = runFloorCli(process.argv.slice(2));
  if (result.stdout) {
    process.stdout.write(result.stdout);
  }
  if (result.stderr) {
    process.stderr.write(result.stderr);
  }
  process.exit(result.code);
}

const currentFile = fileURLToPath(import.meta.url);
if (process.argv[1] === currentFile) {
  main();
}
