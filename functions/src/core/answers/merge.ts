// functions/src/core/answers/merge.ts

import { countQuestions, type AnswerRecord, type AnswersMap } from "./types";

/**
 * Right-biased merge of a partial answer map into the current record.
 * Pure: builds a fresh record, `current` and `patch` are left untouched.
 * The result is meant to replace the stored document in full.
 */
export function mergeAnswers(
  userId: string,
  current: AnswerRecord | null,
  patch: AnswersMap,
  now: number
): AnswerRecord {
  const answers: AnswersMap = { ...(current?.answers ?? {}), ...patch };

  // clock skew between instances must not move updatedAt backwards
  const updatedAt = current ? Math.max(now, current.updatedAt) : now;
  const createdAt = current ? Math.min(current.createdAt, updatedAt) : updatedAt;

  return {
    userId,
    answers,
    createdAt,
    updatedAt,
    totalQuestions: countQuestions(answers),
  };
}
