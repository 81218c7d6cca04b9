import { shuffleWith, type RNG } from "./rng";
import {
  DIRECTION_FIELDS,
  type Direction,
  type DrugPair,
  type FillInTheBlankQuestion,
  type LabeledOption,
  type MultipleChoiceQuestion,
} from "./types";

const DISPLAY_MARKER = "🔵";

type BuiltQuestions = {
  multipleChoice: MultipleChoiceQuestion;
  fillInTheBlank: FillInTheBlankQuestion;
};

/** 0 -> A, 25 -> Z, 26 -> AA */
export const optionLabel = (position: number): string => {
  let n = position;
  let label = "";
  do {
    label = String.fromCharCode(65 + (n % 26)) + label;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return label;
};

export const labelOptions = (options: readonly string[]): LabeledOption[] =>
  options.map((text, i) => {
    const label = optionLabel(i);
    return { label, display_label: `${DISPLAY_MARKER} ${label}`, text };
  });

export const buildQuestions = (
  pair: DrugPair,
  direction: Direction,
  index: number,
  distractors: readonly string[],
  rng: RNG
): BuiltQuestions => {
  const { source, target } = DIRECTION_FIELDS[direction];
  const prompt = pair[source];
  const answer = pair[target];

  const options = shuffleWith([...distractors, answer], rng);

  const multipleChoice: MultipleChoiceQuestion = {
    id: `${direction}-mc-${index}`,
    question: `What is the ${target} for ${prompt}?`,
    options,
    labeled_options: labelOptions(options),
    answer,
  };

  const fillInTheBlank: FillInTheBlankQuestion = {
    id: `${direction}-fib-${index}`,
    question: `${prompt} → ________ (${target})`,
    answer,
  };

  return { multipleChoice, fillInTheBlank };
};
