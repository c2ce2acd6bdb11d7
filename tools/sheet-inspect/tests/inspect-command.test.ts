import * as path from "node:path";
import { fileURLToPath } from "node:url";

import pino from "pino";
import { afterEach, describe, expect, test, vi } from "vitest";
import { MalformedInputException } from "aseprite-sheet";
import { createProgram, inspectFile } from "../src/lib/inspect-command.ts";

const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures");
const fixture = (name: string): string => path.join(FIXTURES_DIR, name);

interface LogRecord {
  level: number;
  msg: string;
  file?: string;
}

function captureLogger() {
  const records: LogRecord[] = [];
  const logger = pino({ level: "info" }, {
    write(line: string) {
      records.push(JSON.parse(line));
    },
  });
  return { logger, records };
}

async function run(args: string[]) {
  const { logger, records } = captureLogger();
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  await createProgram(logger).parseAsync(["node", "sheet-inspect", ...args]);
  const output = log.mock.calls.map((call) => String(call[0]));
  return { output, records };
}

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("inspectFile", () => {
  test("reads and summarizes a file", async () => {
    const summary = await inspectFile(fixture("walker.json"), { strict: false });

    expect(summary.file).toBe(fixture("walker.json"));
    expect(summary.frames).toBe(3);
  });

  test("applies every check in strict mode", async () => {
    await expect(inspectFile(fixture("looping.json"), { strict: false })).resolves.toMatchObject({ frames: 1 });
    await expect(inspectFile(fixture("looping.json"), { strict: true })).rejects.toThrow(
      "Malformed sprite sheet at meta.frameTags[0].loop: unknown field",
    );
  });

  test("accepts a current export in strict mode", async () => {
    await expect(inspectFile(fixture("knight.json"), { strict: true })).resolves.toMatchObject({ frames: 4 });
  });

  test("rejects truncated documents", async () => {
    await expect(inspectFile(fixture("truncated.json"), { strict: false })).rejects.toBeInstanceOf(
      MalformedInputException,
    );
  });
});

describe("sheet-inspect", () => {
  test("prints a text summary per file", async () => {
    const { output, records } = await run([fixture("walker.json")]);

    expect(output).toHaveLength(1);
    expect(output[0]?.split("\n").slice(1, 3)).toEqual([
      "  image: walker.png (58x20, scale 1)",
      "  frames: 3 (array, 500ms)",
    ]);
    expect(records).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });

  test("prints all summaries as one JSON array", async () => {
    const { output } = await run([fixture("walker.json"), fixture("knight.json"), "--json"]);

    expect(output).toHaveLength(1);
    const summaries: unknown = JSON.parse(output[0] ?? "");
    expect(summaries).toMatchObject([
      { file: fixture("walker.json"), layout: "array", frames: 3 },
      { file: fixture("knight.json"), layout: "array", frames: 4, slices: ["hitbox"] },
    ]);
  });

  test("logs progress when verbose", async () => {
    const { records } = await run([fixture("walker.json"), "--verbose"]);

    expect(records.map((record) => record.msg)).toEqual([`[1/1] Inspecting: ${fixture("walker.json")}`]);
  });

  test("keeps going after a failure and sets the exit code", async () => {
    const { output, records } = await run([fixture("truncated.json"), fixture("walker.json")]);

    expect(output).toHaveLength(1);
    expect(records).toHaveLength(2);
    expect(records[0]?.level).toBe(50);
    expect(records[0]?.file).toBe(fixture("truncated.json"));
    expect(records[0]?.msg.startsWith("Invalid JSON: ")).toBe(true);
    expect(records[1]?.msg).toBe("Some files could not be inspected.");
    expect(process.exitCode).toBe(1);
  });
});
