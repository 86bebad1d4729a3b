import { DEFAULT_WRITER_OPTIONS, createWriterConfig } from "@/config/writerConfig";
import { STDOUT_DESTINATION } from "@/output/LineSink";
import { describe, expect, it } from "vitest";

describe("createWriterConfig", () => {
  it("should return the defaults without overrides", () => {
    expect(createWriterConfig()).toEqual(DEFAULT_WRITER_OPTIONS);
  });

  it("should write to standard output without an atmosphere by default", () => {
    const config = createWriterConfig();
    expect(config.destination).toBe(STDOUT_DESTINATION);
    expect(config.atmosphereId).toBe(-1);
    expect(config.quantumEfficiency).toBe(1);
  });

  it("should apply overrides", () => {
    const config = createWriterConfig({ destination: "run.grisu", quantumEfficiency: 0.8 });
    expect(config.destination).toBe("run.grisu");
    expect(config.quantumEfficiency).toBe(0.8);
    expect(config.versionLabel).toBe(DEFAULT_WRITER_OPTIONS.versionLabel);
  });
});
