import { loadDrugs } from "./data/loadDrugs";
import { writeQuiz } from "./output/writeQuiz";
import { assembleQuiz, totalQuestions } from "./quiz/assembleQuiz";
import { parseArgs, resolveConfig, USAGE, type Env } from "./config";
import type { QuizDocument } from "./quiz/types";

export type GeneratorResult = {
  outputPath: string;
  pairCount: number;
  questionCount: number;
  quiz: QuizDocument;
};

export const runGenerator = async (
  argv: readonly string[],
  env: Env
): Promise<GeneratorResult | null> => {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return null;
  }

  const config = resolveConfig(args, env);

  if (config.seed === undefined) {
    console.log("No seed given, output will differ between runs.");
  }

  const pairs = await loadDrugs(config.dataPath);
  if (!pairs.length) {
    console.warn(`No drug pairs found in ${config.dataPath}`);
  }

  const quiz = assembleQuiz({
    pairs,
    distractorCount: config.distractors,
    seed: config.seed,
    strict: config.strict,
  });
  const questionCount = totalQuestions(quiz);

  await writeQuiz(config.outputPath, quiz);
  console.log(
    `Wrote ${config.outputPath} with ${pairs.length} drug pairs (${questionCount} questions).`
  );

  return {
    outputPath: config.outputPath,
    pairCount: pairs.length,
    questionCount,
    quiz,
  };
};
