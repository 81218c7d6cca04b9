import path from "path";
import fsPromises from "fs/promises";
import type { QuizDocument } from "../quiz/types";

export const serializeQuiz = (quiz: QuizDocument): string =>
  JSON.stringify(quiz, null, 2) + "\n";

export const writeQuiz = async (
  outputPath: string,
  quiz: QuizDocument
): Promise<void> => {
  await fsPromises.mkdir(path.dirname(outputPath), { recursive: true });
  await fsPromises.writeFile(outputPath, serializeQuiz(quiz), "utf8");
};
