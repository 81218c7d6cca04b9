export const DIRECTIONS = ["brand_to_generic", "generic_to_brand"] as const;

export type Direction = (typeof DIRECTIONS)[number];

export type DrugField = "brand" | "generic";

export type DrugPair = {
  readonly brand: string;
  readonly generic: string;
};

export type LabeledOption = {
  readonly label: string;
  readonly display_label: string;
  readonly text: string;
};

export type MultipleChoiceQuestion = {
  readonly id: string;
  readonly question: string;
  readonly options: readonly string[];
  readonly labeled_options: readonly LabeledOption[];
  readonly answer: string;
};

export type FillInTheBlankQuestion = {
  readonly id: string;
  readonly question: string;
  readonly answer: string;
};

export type QuizSection = {
  readonly multiple_choice: readonly MultipleChoiceQuestion[];
  readonly fill_in_the_blank: readonly FillInTheBlankQuestion[];
};

export type QuizDocument = Readonly<Record<Direction, QuizSection>>;

// prompt field -> answer field
export const DIRECTION_FIELDS: Record<
  Direction,
  { source: DrugField; target: DrugField }
> = {
  brand_to_generic: { source: "brand", target: "generic" },
  generic_to_brand: { source: "generic", target: "brand" },
};
