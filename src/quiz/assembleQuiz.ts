import { sampleDistractors } from "./distractors";
import { buildQuestions } from "./questionBuilder";
import { makeRng, type RNG } from "./rng";
import {
  DIRECTIONS,
  DIRECTION_FIELDS,
  type Direction,
  type DrugPair,
  type FillInTheBlankQuestion,
  type MultipleChoiceQuestion,
  type QuizDocument,
  type QuizSection,
} from "./types";

export type AssembleParams = {
  pairs: readonly DrugPair[];
  distractorCount: number;
  seed?: number;
  strict?: boolean;
  // overrides `seed`; one source is shared by the whole run
  rng?: RNG;
};

const assembleSection = (
  pairs: readonly DrugPair[],
  direction: Direction,
  distractorCount: number,
  strict: boolean,
  rng: RNG
): QuizSection => {
  const { target } = DIRECTION_FIELDS[direction];
  const pool = pairs.map((pair) => pair[target]);

  const multipleChoice: MultipleChoiceQuestion[] = [];
  const fillInTheBlank: FillInTheBlankQuestion[] = [];

  pairs.forEach((pair, i) => {
    const distractors = sampleDistractors(
      pair[target],
      pool,
      distractorCount,
      rng,
      { strict }
    );
    const built = buildQuestions(pair, direction, i + 1, distractors, rng);
    multipleChoice.push(built.multipleChoice);
    fillInTheBlank.push(built.fillInTheBlank);
  });

  return { multiple_choice: multipleChoice, fill_in_the_blank: fillInTheBlank };
};

export const assembleQuiz = ({
  pairs,
  distractorCount,
  seed,
  strict = false,
  rng = makeRng(seed),
}: AssembleParams): QuizDocument => {
  // brand_to_generic draws from the rng first, then generic_to_brand
  const brandToGeneric = assembleSection(
    pairs,
    "brand_to_generic",
    distractorCount,
    strict,
    rng
  );
  const genericToBrand = assembleSection(
    pairs,
    "generic_to_brand",
    distractorCount,
    strict,
    rng
  );

  return {
    brand_to_generic: brandToGeneric,
    generic_to_brand: genericToBrand,
  };
};

export const totalQuestions = (quiz: QuizDocument): number =>
  DIRECTIONS.reduce(
    (sum, direction) =>
      sum +
      quiz[direction].multiple_choice.length +
      quiz[direction].fill_in_the_blank.length,
    0
  );
