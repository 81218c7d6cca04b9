import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULTS = {
  dataPath: "data/sample_drugs.csv",
  outputPath: "quizzes.json",
  distractors: "3",
};

export type CliArgs = {
  data?: string;
  output?: string;
  distractors?: string;
  seed?: string;
  strict: boolean;
  help: boolean;
};

export type Env = Record<string, string | undefined>;

const integerString = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "must be an integer")
  .transform(Number);

const ConfigSchema = z.object({
  dataPath: z.string().trim().min(1),
  outputPath: z.string().trim().min(1),
  distractors: integerString.pipe(z.number().int().positive()),
  seed: integerString.pipe(z.number().int().safe()).optional(),
  strict: z.boolean(),
});

export type GeneratorConfig = z.infer<typeof ConfigSchema>;

export const USAGE = `Usage: drug-quiz [options]

Generate multiple-choice and fill-in-the-blank quizzes from brand/generic drug pairs.

Options:
  --data <path>         CSV with brand and generic columns
                        (default: ${DEFAULTS.dataPath}, a bundled sample of 50 pairs)
  --output <path>       Where to write the generated JSON (default: ${DEFAULTS.outputPath})
  --distractors <n>     Incorrect options per multiple-choice question (default: ${DEFAULTS.distractors})
  --seed <n>            Integer seed for reproducible output, negative allowed (default: unseeded)
  --strict              Fail when a question cannot get the requested number of distractors
  -h, --help            Show this message`;

const VALUE_FLAGS = {
  "--data": "data",
  "--output": "output",
  "--distractors": "distractors",
  "--seed": "seed",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

const isValueFlag = (name: string): name is ValueFlag => name in VALUE_FLAGS;

/** Accepts `--name value` and `--name=value`; anything unrecognised is a ConfigError. */
export const parseArgs = (argv: readonly string[]): CliArgs => {
  const args: CliArgs = { strict: false, help: false };
  const issues: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eq = token.indexOf("=");
    const name = token.startsWith("--") && eq > 0 ? token.slice(0, eq) : token;
    const inline = name === token ? undefined : token.slice(eq + 1);

    if (isValueFlag(name)) {
      let value = inline;
      if (value === undefined) {
        const next = argv[i + 1];
        // a negative seed like "-5" is a value, "--seed" is not
        if (next !== undefined && !next.startsWith("--")) {
          value = next;
          i++;
        }
      }
      if (value === undefined || value === "") {
        issues.push(`${name} requires a value`);
      } else {
        args[VALUE_FLAGS[name]] = value;
      }
    } else if (name === "--strict" || name === "--help" || name === "-h") {
      if (inline !== undefined) {
        issues.push(`${name} does not take a value`);
      } else if (name === "--strict") {
        args.strict = true;
      } else {
        args.help = true;
      }
    } else {
      issues.push(`unknown option ${name}`);
    }
  }

  if (issues.length) throw new ConfigError(issues);
  return args;
};

const envFlag = (value: string | undefined): boolean =>
  value !== undefined && ["1", "true", "yes"].includes(value.trim().toLowerCase());

// empty env values count as unset
const envValue = (env: Env, key: string): string | undefined =>
  env[key]?.trim() ? env[key] : undefined;

/** Flags win over environment variables, which win over defaults. */
export const resolveConfig = (args: CliArgs, env: Env): GeneratorConfig => {
  const result = ConfigSchema.safeParse({
    dataPath: args.data ?? envValue(env, "QUIZ_DATA_PATH") ?? DEFAULTS.dataPath,
    outputPath:
      args.output ?? envValue(env, "QUIZ_OUTPUT_PATH") ?? DEFAULTS.outputPath,
    distractors:
      args.distractors ??
      envValue(env, "QUIZ_DISTRACTORS") ??
      DEFAULTS.distractors,
    seed: args.seed ?? envValue(env, "QUIZ_SEED"),
    strict: args.strict || envFlag(env.QUIZ_STRICT),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
      )
    );
  }

  return result.data;
};
