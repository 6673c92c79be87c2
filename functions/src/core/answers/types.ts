// functions/src/core/answers/types.ts

// questionId -> answer text. Keys are opaque ids, values may be "".
export type AnswersMap = Record<string, string>;

export type AnswerRecord = {
  userId: string;
  answers: AnswersMap;
  createdAt: number; // epoch ms, set once
  updatedAt: number; // epoch ms, never decreases
  totalQuestions: number; // always |answers|
};

export type AnswerStats = {
  totalQuestions: number;
  completedQuestions: number;
  completionPercentage: number;
  createdAt: number;
  updatedAt: number;
};

export type SaveAnswersResult = {
  record: AnswerRecord;
  created: boolean;
};

export function countQuestions(answers: AnswersMap): number {
  return Object.keys(answers).length;
}
