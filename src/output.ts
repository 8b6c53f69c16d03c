import { writeFile } from "node:fs/promises";

import type { QueryAnswer } from "./solver.js";

/** Cost printed for queries without a path. */
export const NO_PATH_COST = -1;

/**
 * Renders one answer. A path prints `source cost` followed by every later word
 * of the path, one per line; anything else prints `source -1` then the target.
 */
export function formatAnswer(answer: QueryAnswer): string {
  if (answer.status !== "path") {
    return `${answer.source} ${NO_PATH_COST}\n${answer.target}\n`;
  }
  const rest = answer.words.slice(1);
  // A query from a word to itself has a single-word path; the target still gets its own line.
  const steps = rest.length === 0 ? [answer.target] : rest;
  return [`${answer.source} ${answer.cost}`, ...steps].join("\n") + "\n";
}

export function formatAnswers(answers: readonly QueryAnswer[]): string {
  return answers.map(formatAnswer).join("");
}

export async function writeAnswers(path: string, answers: readonly QueryAnswer[]): Promise<void> {
  await writeFile(path, formatAnswers(answers), "utf8");
}
