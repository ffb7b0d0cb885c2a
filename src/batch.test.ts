import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import winston from "winston";
import { getArgValue, runBatch } from "./batch";

const silent = winston.createLogger({ silent: true });
let dir = "";

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "triage-batch-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("getArgValue", () => {
  test("supports both flag styles", () => {
    expect(getArgValue(["--in", "a.json"], "--in")).toBe("a.json");
    expect(getArgValue(["--in=a=b.json"], "--in")).toBe("a=b.json");
    expect(getArgValue(["--in", "--out", "x"], "--in")).toBeNull();
    expect(getArgValue([], "--in")).toBeNull();
  });
});

describe("runBatch", () => {
  test("scores records and writes results with alerts", () => {
    const inPath = join(dir, "records.json");
    const outPath = join(dir, "out.json");
    writeFileSync(
      inPath,
      JSON.stringify([
        { id: "P2", type: "heart", features: [70, 1, 3, 165, 310, 1, 1, 140, 1, 2.5, 2, 2, 3] },
        { id: "P1", type: "alzheimer", features: [85, 6, 1, 8, 1600, 0.65, 1.0] },
        { id: "P3", type: "heart", features: [63, "n/a"] },
      ])
    );

    const code = runBatch(["--in", inPath, `--out=${outPath}`, "--strategy", "rule_based"], {
      env: {},
      logger: silent,
    });

    expect(code).toBe(0);
    const written: unknown = JSON.parse(readFileSync(outPath, "utf8"));
    expect(written).toMatchObject({
      results: [
        { id: "P2", assessment: { riskPercentage: 95 } },
        { id: "P1", assessment: { label: "Severe Alzheimer's Disease" } },
        { id: "P3", type: "heart" },
      ],
      alerts: { high_risk: ["P1", "P2"], data_quality_issues: ["P3"], degraded: [] },
    });
    expect(console.log).toHaveBeenCalledWith("Scored 2/3 records.");
  });

  test("exits 1 on unreadable input", () => {
    expect(runBatch(["--in", join(dir, "missing.json")], { env: {}, logger: silent })).toBe(1);
  });

  test("exits 1 when the input is not an array", () => {
    const inPath = join(dir, "object.json");
    writeFileSync(inPath, JSON.stringify({ id: "P1" }));
    expect(runBatch(["--in", inPath], { env: {}, logger: silent })).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`${inPath} must contain a JSON array of records.`);
  });

  test("exits 1 without --in or with an unknown strategy", () => {
    expect(runBatch([], { env: {}, logger: silent })).toBe(1);
    expect(runBatch(["--in", "x.json", "--strategy", "neural"], { env: {}, logger: silent })).toBe(1);
  });
});
