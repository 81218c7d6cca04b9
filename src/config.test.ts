import { describe, expect, it } from "vitest";
import { parseArgs, resolveConfig, USAGE } from "./config";
import { ConfigError } from "./errors";

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
};

describe("parseArgs", () => {
  it("reads spaced and inline flag values", () => {
    expect(
      parseArgs(["--data", "drugs.csv", "--seed=7", "--strict", "--output=out/q.json"])
    ).toEqual({
      data: "drugs.csv",
      output: "out/q.json",
      distractors: undefined,
      seed: "7",
      strict: true,
      help: false,
    });
  });

  it("recognises help", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs([]).help).toBe(false);
    expect(USAGE).toContain("-h, --help");
  });

  it("takes a negative number as a value", () => {
    expect(parseArgs(["--seed", "-5"]).seed).toBe("-5");
  });

  it("rejects a flag followed by another flag instead of a value", () => {
    expect(issuesOf(() => parseArgs(["--output", "--seed", "5"]))).toEqual([
      "--output requires a value",
    ]);
  });

  it("rejects a trailing flag without a value", () => {
    expect(issuesOf(() => parseArgs(["--distractors"]))).toEqual([
      "--distractors requires a value",
    ]);
    expect(issuesOf(() => parseArgs(["--data="]))).toEqual([
      "--data requires a value",
    ]);
  });

  it("rejects unknown options", () => {
    expect(issuesOf(() => parseArgs(["--distractor", "5"]))).toEqual([
      "unknown option --distractor",
      "unknown option 5",
    ]);
  });

  it("rejects a value on a switch", () => {
    expect(issuesOf(() => parseArgs(["--strict=yes"]))).toEqual([
      "--strict does not take a value",
    ]);
  });

  it("throws a ConfigError naming the bad option", () => {
    expect(() => parseArgs(["--distractor", "5"])).toThrow(ConfigError);
    expect(() => parseArgs(["--distractor"])).toThrow(
      "Invalid configuration: unknown option --distractor"
    );
  });
});

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    expect(resolveConfig(parseArgs([]), {})).toEqual({
      dataPath: "data/sample_drugs.csv",
      outputPath: "quizzes.json",
      distractors: 3,
      seed: undefined,
      strict: false,
    });
  });

  it("reads the environment", () => {
    const config = resolveConfig(parseArgs([]), {
      QUIZ_DATA_PATH: "env.csv",
      QUIZ_OUTPUT_PATH: "env.json",
      QUIZ_DISTRACTORS: "4",
      QUIZ_SEED: "2024",
      QUIZ_STRICT: "true",
    });
    expect(config).toEqual({
      dataPath: "env.csv",
      outputPath: "env.json",
      distractors: 4,
      seed: 2024,
      strict: true,
    });
  });

  it("lets flags override the environment", () => {
    const config = resolveConfig(parseArgs(["--distractors", "2", "--seed", "-5"]), {
      QUIZ_DISTRACTORS: "4",
      QUIZ_SEED: "2024",
    });
    expect(config.distractors).toBe(2);
    expect(config.seed).toBe(-5);
  });

  it("treats blank environment values as unset", () => {
    const config = resolveConfig(parseArgs([]), {
      QUIZ_SEED: "",
      QUIZ_DISTRACTORS: "  ",
      QUIZ_STRICT: "0",
    });
    expect(config.seed).toBeUndefined();
    expect(config.distractors).toBe(3);
    expect(config.strict).toBe(false);
  });

  it("rejects a non-positive distractor count", () => {
    const issues = issuesOf(() => resolveConfig(parseArgs(["--distractors", "0"]), {}));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^distractors: /);
  });

  it("rejects a seed that is not an integer", () => {
    expect(issuesOf(() => resolveConfig(parseArgs(["--seed", "abc"]), {}))).toEqual([
      "seed: must be an integer",
    ]);
  });

  it("reports every invalid setting at once", () => {
    const issues = issuesOf(() =>
      resolveConfig(parseArgs(["--distractors", "x", "--seed", "1.5"]), {})
    );
    expect(issues).toEqual([
      "distractors: must be an integer",
      "seed: must be an integer",
    ]);
  });

  it("throws a ConfigError", () => {
    expect(() => resolveConfig(parseArgs(["--seed", "abc"]), {})).toThrow(
      "Invalid configuration: seed: must be an integer"
    );
  });
});
