import * as path from "path";
import { loadResults, parseResults } from "./result-loader";
import { MalformedRowError, MissingColumnError } from "../errors";
import { setDebugOutput } from "../debug";

beforeAll(() => setDebugOutput(false));
afterAll(() => setDebugOutput(true));

const FIXTURE = path.join(__dirname, "__fixtures__", "channel-small.csv");

describe("loadResults", () => {
  it("reads samples in file order and ignores extra columns", () => {
    const samples = loadResults(FIXTURE);
    expect(samples).toHaveLength(6);
    expect(samples[0]).toEqual({ x: 0, y: 0, velocityX: 0, velocityY: 0 });
    expect(samples[3]).toEqual({ x: 1, y: 0.5, velocityX: 0.5, velocityY: -0.001 });
  });

  it("fails on a delimiter that does not match the file", () => {
    expect(() => loadResults(FIXTURE, { delimiter: ";" })).toThrow(MissingColumnError);
  });
});

describe("parseResults", () => {
  it("accepts columns in any order", () => {
    const samples = parseResults("velocity.y,y,velocity.x,x\n0.1,2,0.3,4\n");
    expect(samples).toEqual([{ x: 4, y: 2, velocityX: 0.3, velocityY: 0.1 }]);
  });

  it("accepts CRLF line endings, blank lines and scientific notation", () => {
    const samples = parseResults("x,y,velocity.x,velocity.y\r\n\r\n1e-3,2.5E-2,-1.5e+0,0\r\n");
    expect(samples).toEqual([{ x: 0.001, y: 0.025, velocityX: -1.5, velocityY: 0 }]);
  });

  it("accepts quoted numeric fields", () => {
    const samples = parseResults('"x","y","velocity.x","velocity.y"\n"0.5", "0.25" ,"1e-2","-3"\n');
    expect(samples).toEqual([{ x: 0.5, y: 0.25, velocityX: 0.01, velocityY: -3 }]);
  });

  it("rejects a quoted field that holds no number", () => {
    expect(() => parseResults('x,y,velocity.x,velocity.y\n1,2,"",4\n')).toThrow(
      new MalformedRowError(2, "velocity.x", "empty field"),
    );
  });

  it("supports other delimiters", () => {
    const samples = parseResults("x\ty\tvelocity.x\tvelocity.y\n1\t2\t3\t4", { delimiter: "\t" });
    expect(samples).toEqual([{ x: 1, y: 2, velocityX: 3, velocityY: 4 }]);
  });

  it("returns no samples for a header-only file", () => {
    expect(parseResults("x,y,velocity.x,velocity.y\n")).toEqual([]);
  });

  it("lists every missing required column", () => {
    try {
      parseResults("x,velocity.x,p\n1,2,3\n", { source: "step_1.csv" });
      throw new Error("expected parseResults to fail");
    } catch (error) {
      expect(error).toBeInstanceOf(MissingColumnError);
      if (error instanceof MissingColumnError) {
        expect(error.columns).toEqual(["y", "velocity.y"]);
        expect(error.message).toBe("step_1.csv is missing required column(s): y, velocity.y");
      }
    }
  });

  it("treats an empty file as missing every column", () => {
    expect(() => parseResults("\n\n")).toThrow(
      "result file (no header row) is missing required column(s): x, y, velocity.x, velocity.y",
    );
  });

  it("rejects a non-numeric field with its line and column", () => {
    const content = "x,y,velocity.x,velocity.y\n0,0,1,0\n1,0,abc,0\n";
    expect(() => parseResults(content)).toThrow(
      new MalformedRowError(3, "velocity.x", "'abc' is not a finite number"),
    );
  });

  it("rejects empty, NaN and infinite fields", () => {
    expect(() => parseResults("x,y,velocity.x,velocity.y\n0,,1,0\n")).toThrow("line 2, column 'y': empty field");
    expect(() => parseResults("x,y,velocity.x,velocity.y\nNaN,0,1,0\n")).toThrow(MalformedRowError);
    expect(() => parseResults("x,y,velocity.x,velocity.y\n0,0,Infinity,0\n")).toThrow(MalformedRowError);
  });

  it("rejects a row that is too short", () => {
    expect(() => parseResults("x,y,velocity.x,velocity.y\n0,0,1\n")).toThrow(
      "line 2: expected 4 fields, found 3",
    );
  });

  it("ignores fields in unused columns", () => {
    const samples = parseResults("x,y,velocity.x,velocity.y,note\n0,0,1,0,n/a\n");
    expect(samples).toEqual([{ x: 0, y: 0, velocityX: 1, velocityY: 0 }]);
  });
});
