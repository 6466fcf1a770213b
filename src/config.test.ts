import * as path from "path";
import { DEFAULT_VALIDATION_CONFIG, imagePath, resolveConfig, resultPath, scenarioPath } from "./config";

describe("resolveConfig", () => {
  it("returns the channel defaults without overrides", () => {
    const config = resolveConfig();
    expect(config).toEqual(DEFAULT_VALIDATION_CONFIG);
    expect(config.xTarget).toBe(4.5);
    expect(config.resolution).toBe(200);
    expect(config.chart.velocityTickInterval).toBe(0.05);
  });

  it("merges nested solver and chart overrides", () => {
    const config = resolveConfig({ xTarget: 2, solver: { enabled: false }, chart: { width: 800 } });
    expect(config.xTarget).toBe(2);
    expect(config.solver).toEqual({ ...DEFAULT_VALIDATION_CONFIG.solver, enabled: false });
    expect(config.chart.width).toBe(800);
    expect(config.chart.height).toBe(DEFAULT_VALIDATION_CONFIG.chart.height);
  });

  it("does not mutate the defaults", () => {
    resolveConfig({ solver: { executable: "other" } });
    expect(DEFAULT_VALIDATION_CONFIG.solver.executable).toBe("./.build/cfdeez.exe");
  });
});

describe("file paths", () => {
  const config = resolveConfig({ directory: "cases/channel" });

  it("places the scenario and result in the case directory", () => {
    expect(scenarioPath(config)).toBe(path.join("cases/channel", "laminar_flow.fml"));
    expect(resultPath(config)).toBe(path.join("cases/channel", "laminar_channel_flow_1.csv"));
  });

  it("embeds the transect location in the chart file name", () => {
    expect(imagePath(config)).toBe(path.join("cases/channel", "laminar_channel_velocity_profile4.5.png"));
    expect(imagePath({ ...config, xTarget: 0.25 })).toBe(
      path.join("cases/channel", "laminar_channel_velocity_profile0.25.png"),
    );
  });
});
