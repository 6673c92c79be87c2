// functions/src/core/answers/manager.ts

import { logger } from "../logging/logger";
import { NotFoundError } from "./errors";
import { mergeAnswers } from "./merge";
import { computeAnswerStats } from "./stats";
import { withStoreTimeout, type AnswerStore } from "./store";
import type { AnswerRecord, AnswersMap, AnswerStats, SaveAnswersResult } from "./types";
import { assertValidAnswersPatch, assertValidQuestionId } from "./validate";

export type AnswerRecordManagerDeps = {
  store: AnswerStore;
  storeTimeoutMs: number;
  now?: () => number;
};

export type AnswerRecordManager = {
  saveAnswers(userId: string, newAnswers: AnswersMap): Promise<SaveAnswersResult>;
  getAnswers(userId: string): Promise<AnswerRecord>;
  deleteAnswers(userId: string): Promise<{ existed: boolean }>;
  updateSingleAnswer(userId: string, questionId: string, answerText: string): Promise<SaveAnswersResult>;
  getStats(userId: string): Promise<AnswerStats>;
};

export function createAnswerRecordManager(deps: AnswerRecordManagerDeps): AnswerRecordManager {
  const now = deps.now ?? Date.now;

  function bounded<T>(op: string, userId: string, run: () => Promise<T>): Promise<T> {
    return withStoreTimeout(op, userId, deps.storeTimeoutMs, run);
  }

  // The one write path for answers: save and single-field update both land here.
  async function applyPatch(op: string, userId: string, patch: AnswersMap): Promise<SaveAnswersResult> {
    assertValidAnswersPatch(patch);

    let created = false;
    const record = await bounded(op, userId, () =>
      deps.store.transact(userId, (current) => {
        // may run more than once under contention; last run wins
        created = current === null;
        return mergeAnswers(userId, current, patch, now());
      })
    );

    logger.info(created ? "ai_answers_created" : "ai_answers_updated", {
      userId,
      op,
      patchedQuestions: Object.keys(patch).length,
      totalQuestions: record.totalQuestions,
    });

    return { record, created };
  }

  async function readExisting(op: string, userId: string): Promise<AnswerRecord> {
    const record = await bounded(op, userId, () => deps.store.get(userId));
    if (!record) {
      throw new NotFoundError();
    }
    return record;
  }

  return {
    saveAnswers(userId, newAnswers) {
      return applyPatch("save", userId, newAnswers);
    },

    async getAnswers(userId) {
      const record = await readExisting("get", userId);
      logger.info("ai_answers_retrieved", { userId, totalQuestions: record.totalQuestions });
      return record;
    },

    async deleteAnswers(userId) {
      const existed = await bounded("delete", userId, () => deps.store.delete(userId));
      logger.info("ai_answers_deleted", { userId, existed });
      return { existed };
    },

    async updateSingleAnswer(userId, questionId, answerText) {
      assertValidQuestionId(questionId);
      return applyPatch("update_single", userId, { [questionId]: answerText });
    },

    async getStats(userId) {
      const record = await readExisting("stats", userId);
      return computeAnswerStats(record);
    },
  };
}
