// functions/src/core/answers/stats.ts

import { countQuestions, type AnswerRecord, type AnswerStats } from "./types";

export function computeAnswerStats(record: AnswerRecord): AnswerStats {
  // recount from the live map, never trust a stored counter
  const totalQuestions = countQuestions(record.answers);
  const completedQuestions = Object.values(record.answers).filter((a) => a.trim() !== "").length;

  const completionPercentage =
    totalQuestions > 0 ? Math.round((completedQuestions / totalQuestions) * 100 * 100) / 100 : 0;

  return {
    totalQuestions,
    completedQuestions,
    completionPercentage,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}
