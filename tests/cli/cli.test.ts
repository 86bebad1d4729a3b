import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { UsageError, main, parseArguments } from "@/cli";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("parseArguments", () => {
  it("should require an input file", () => {
    expect(() => parseArguments([])).toThrow(UsageError);
    expect(() => parseArguments(["--input="])).toThrow("--input=FILE is required");
  });

  it("should leave unset options to the defaults", () => {
    expect(parseArguments(["--input=run.json"])).toEqual({
      input: "run.json",
      printMoreInfo: false,
      options: {},
    });
  });

  it("should read every writer option", () => {
    const parsed = parseArguments([
      "--input=run.json",
      "--output=run.grisu",
      "--atmosphere=1",
      "--qeff=0.75",
      "--label=test run",
      "--more-info",
    ]);

    expect(parsed).toEqual({
      input: "run.json",
      printMoreInfo: true,
      options: {
        destination: "run.grisu",
        atmosphereId: 1,
        quantumEfficiency: 0.75,
        versionLabel: "test run",
      },
    });
  });

  it("should reject non-numeric values for numeric options", () => {
    expect(() => parseArguments(["--input=run.json", "--qeff=high"])).toThrow(
      '--qeff expects a number, got "high"'
    );
  });

  it("should reject a fractional atmosphere id", () => {
    expect(() => parseArguments(["--input=run.json", "--atmosphere=1.7"])).toThrow(
      '--atmosphere expects an integer, got "1.7"'
    );
    expect(() => parseArguments(["--input=run.json", "--atmosphere=1.7"])).toThrow(UsageError);
  });

  it("should accept a negative integer atmosphere id", () => {
    expect(parseArguments(["--input=run.json", "--atmosphere=-1"]).options.atmosphereId).toBe(-1);
  });

  it("should reject extended info without an atmosphere model", () => {
    expect(() => parseArguments(["--input=run.json", "--more-info"])).toThrow(UsageError);
    expect(() => parseArguments(["--input=run.json", "--more-info", "--atmosphere=-1"])).toThrow(
      UsageError
    );
  });
});

describe("main", () => {
  let dir: string;
  let input: string;
  let errors: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "grisu-cli-"));
    input = path.join(dir, "run.json");
    const runHeader = new Array<number>(72).fill(0);
    runHeader[2] = 14;
    fs.writeFileSync(
      input,
      JSON.stringify({
        runHeader,
        events: [
          {
            energy: 1,
            azimuth: 0,
            altitude: 90,
            xCore: 0,
            yCore: 0,
            firstInteraction: 10,
            showerId: 5,
            photons: [{ telescope: 0, x: 10, y: -20, cx: 0.6, cy: 0, zem: 1000, ctime: 5.5, lambda: 450.7 }],
          },
        ],
      })
    );
    errors = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should convert the input into the output file", () => {
    const output = path.join(dir, "run.grisu");
    expect(main([`--input=${input}`, `--output=${output}`])).toBe(0);

    const lines = fs.readFileSync(output, "utf8").split("\n");
    expect(lines[0]).toBe("* HEADF  <-- Start of header flag");
    expect(lines).toContain("PTYPE: 14");
    expect(lines).toContain("S 1.0000000 -0.0000000 -0.0000000 0.0000000 0.0000000 10.0000000 -1 -1 -1");
    expect(lines).toContain(
      "P +20.0000000 -10.0000000 -0.0000000 -0.6000000 +1000.0000000 +5.5000000 +450 +3 +1"
    );
    expect(lines.at(-1)).toBe("");
  });

  it("should return 2 on a usage error", () => {
    expect(main([])).toBe(2);
    expect(errors).toEqual(["--input=FILE is required"]);
  });

  it("should return 1 and name the file when the output cannot be opened", () => {
    const output = path.join(dir, "missing", "run.grisu");
    expect(main([`--input=${input}`, `--output=${output}`])).toBe(1);
    expect(errors).toEqual([`error opening outputfile: ${output}`]);
  });

  it("should return 1 on malformed input", () => {
    fs.writeFileSync(input, JSON.stringify({ runHeader: [], events: [] }));
    const output = path.join(dir, "run.grisu");

    expect(main([`--input=${input}`, `--output=${output}`])).toBe(1);
    expect(errors).toEqual(["Invalid input at runHeader: expected at least 72 words"]);
  });
});
