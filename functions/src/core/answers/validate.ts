// functions/src/core/answers/validate.ts

import { ValidationError } from "./errors";
import type { AnswersMap } from "./types";

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Firestore field-name limits: __name__-style ids are reserved, 1500 bytes max
const RESERVED_FIELD_NAME = /^__.*__$/;
const MAX_FIELD_NAME_BYTES = 1500;

export function assertValidQuestionId(questionId: string): void {
  if (questionId.trim() === "") {
    throw new ValidationError("question_id", "Question id cannot be empty");
  }
}

/**
 * Domain rules for an incoming partial answer map.
 * Runs before any store access, so a rejected batch is never partially applied.
 */
export function assertValidAnswersPatch(answers: AnswersMap): void {
  const keys = Object.keys(answers);
  if (keys.length === 0) {
    throw new ValidationError("answers", "Answers cannot be empty");
  }

  for (const key of keys) {
    if (key.trim() === "") {
      throw new ValidationError("answers", "Question id cannot be empty");
    }
    if (RESERVED_FIELD_NAME.test(key)) {
      throw new ValidationError(`answers.${key}`, `Question id ${key} is reserved`);
    }
    if (Buffer.byteLength(key, "utf8") > MAX_FIELD_NAME_BYTES) {
      throw new ValidationError("answers", `Question id exceeds ${MAX_FIELD_NAME_BYTES} bytes`);
    }
    if (typeof answers[key] !== "string") {
      throw new ValidationError(`answers.${key}`, `Answer for question ${key} must be a string`);
    }
  }
}

// Boundary coercion: request JSON -> AnswersMap. Rejects rather than stringifying.
export function parseAnswersMap(raw: unknown): AnswersMap {
  if (!isPlainObject(raw)) {
    throw new ValidationError("answers", "Answers must be an object of question id to answer text");
  }

  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== "string") {
      throw new ValidationError(`answers.${key}`, `Answer for question ${key} must be a string`);
    }
    entries.push([key, value]);
  }

  // fromEntries defines own properties; plain assignment would eat a "__proto__" key
  const out: AnswersMap = Object.fromEntries(entries);

  assertValidAnswersPatch(out);
  return out;
}

export function parseSaveAnswersBody(body: unknown): AnswersMap {
  if (!isPlainObject(body)) {
    throw new ValidationError("body", "Missing request body");
  }
  if (!("answers" in body)) {
    throw new ValidationError("answers", "Missing answers");
  }
  return parseAnswersMap(body.answers);
}

export function parseSingleAnswer(body: unknown, queryAnswer: unknown): string {
  const fromBody = isPlainObject(body) ? body.answer : undefined;
  const answer = fromBody !== undefined ? fromBody : queryAnswer;

  if (typeof answer !== "string") {
    throw new ValidationError("answer", "Missing or invalid answer");
  }
  return answer;
}
