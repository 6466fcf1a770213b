import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runValidation } from "./pipeline";
import { ProcessLauncher } from "./solver/run-solver";
import { InvalidResolutionError, MissingColumnError, ProcessInvocationError } from "./errors";
import { setDebugOutput } from "./debug";

let workDir: string;

beforeAll(() => setDebugOutput(false));
afterAll(() => setDebugOutput(true));

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "validation-"));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

/** Laminar channel of height 1 m and length 9 m on a 0.5 m x 0.1 m grid. */
function channelCsv(): string {
  const rows = ["x,y,velocity.x,velocity.y,pressure"];
  for (let r = 0; r <= 10; r++) {
    for (let c = 0; c <= 18; c++) {
      const y = r * 0.1;
      rows.push(`${c * 0.5},${y},${0.6 * y * (1 - y)},0,${1 - c / 18}`);
    }
  }
  return rows.join("\n") + "\n";
}

function fakeSolver(calls: string[][], content: string = channelCsv()): ProcessLauncher {
  return (command, args) => {
    calls.push([command, ...args]);
    fs.writeFileSync(path.join(workDir, "laminar_channel_flow_1.csv"), content);
    return { status: 0, signal: null };
  };
}

describe("runValidation", () => {
  it("runs the solver, extracts the profile and writes the chart", () => {
    const calls: string[][] = [];
    const report = runValidation({ directory: workDir, resolution: 11 }, { launcher: fakeSolver(calls) });

    expect(calls).toEqual([["./.build/cfdeez.exe", path.join(workDir, "laminar_flow.fml")]]);
    expect(report.solverRun?.exitCode).toBe(0);
    expect(report.sampleCount).toBe(19 * 11);
    expect(report.transect).toEqual({ xTarget: 4.5, yMin: 0, yMax: 1, resolution: 11 });
    expect(report.degeneracy).toBeNull();
    expect(report.profile[5].value).toBeCloseTo(0.15, 12);
    expect(report.profile[0].value).toBeCloseTo(0, 12);

    expect(report.imagePath).toBe(path.join(workDir, "laminar_channel_velocity_profile4.5.png"));
    expect(fs.existsSync(report.imagePath)).toBe(true);
  });

  it("re-renders from an existing result file with the solver step disabled", () => {
    fs.writeFileSync(path.join(workDir, "laminar_channel_flow_1.csv"), channelCsv());
    const report = runValidation({ directory: workDir, xTarget: 2, solver: { enabled: false } });

    expect(report.solverRun).toBeNull();
    expect(report.profile).toHaveLength(200);
    expect(report.imagePath).toBe(path.join(workDir, "laminar_channel_velocity_profile2.png"));
  });

  it("produces the same profile and chart on re-runs", () => {
    fs.writeFileSync(path.join(workDir, "laminar_channel_flow_1.csv"), channelCsv());
    const first = runValidation({ directory: workDir, solver: { enabled: false } });
    const firstPng = fs.readFileSync(first.imagePath);
    const second = runValidation({ directory: workDir, solver: { enabled: false } });

    expect(second.profile).toEqual(first.profile);
    expect(fs.readFileSync(second.imagePath).equals(firstPng)).toBe(true);
  });

  it("aborts before reading results when the solver fails", () => {
    const launcher: ProcessLauncher = () => ({ status: 1, signal: null });
    expect(() => runValidation({ directory: workDir }, { launcher })).toThrow(ProcessInvocationError);
    expect(fs.existsSync(path.join(workDir, "laminar_channel_velocity_profile4.5.png"))).toBe(false);
  });

  it("aborts on a result file without velocity columns", () => {
    const calls: string[][] = [];
    const launcher = fakeSolver(calls, "x,y,p\n0,0,1\n");
    expect(() => runValidation({ directory: workDir }, { launcher })).toThrow(MissingColumnError);
  });

  it("aborts on an invalid resolution", () => {
    const calls: string[][] = [];
    expect(() => runValidation({ directory: workDir, resolution: 1 }, { launcher: fakeSolver(calls) }))
      .toThrow(InvalidResolutionError);
  });

  it("charts an empty profile when the transect misses the domain", () => {
    const calls: string[][] = [];
    const report = runValidation({ directory: workDir, xTarget: 20 }, { launcher: fakeSolver(calls) });
    expect(report.profile.every(e => e.value === undefined)).toBe(true);
    expect(fs.existsSync(report.imagePath)).toBe(true);
  });
});
