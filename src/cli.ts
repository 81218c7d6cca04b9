#!/usr/bin/env node
import dotenv from "dotenv";
import { runGenerator } from "./generateQuizzes";

dotenv.config();

runGenerator(process.argv.slice(2), process.env).catch((err: unknown) => {
  console.error("Quiz generation failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
