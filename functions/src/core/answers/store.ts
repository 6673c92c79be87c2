// functions/src/core/answers/store.ts

import { logger } from "../logging/logger";
import { isAnswersError, StoreUnavailableError } from "./errors";
import type { AnswerRecord } from "./types";

/**
 * Durable owner of AnswerRecords, one per userId.
 *
 * `transact` is the only write path for answers: `mutate` receives the current
 * record (or null) and returns the record that replaces it in full. Implementations
 * must make the read and the write indivisible with respect to other calls for the
 * same userId, and must never serialize calls for different userIds.
 */
export type AnswerStore = {
  get(userId: string): Promise<AnswerRecord | null>;
  transact(
    userId: string,
    mutate: (current: AnswerRecord | null) => AnswerRecord
  ): Promise<AnswerRecord>;
  // true if a record existed
  delete(userId: string): Promise<boolean>;
};

/**
 * Bounds a store call. On timeout the caller gets StoreUnavailableError; the
 * underlying call keeps running and its late result is dropped. Any other
 * failure is rethrown unchanged.
 */
export async function withStoreTimeout<T>(
  op: string,
  userId: string,
  timeoutMs: number,
  run: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      logger.warn("ai_answers_store_timeout", { op, userId, timeoutMs });
      reject(new StoreUnavailableError());
    }, timeoutMs);
  });

  const call = run();
  // a call that loses the race must not surface as an unhandled rejection
  call.catch((err: unknown) => {
    logger.debug("ai_answers_store_call_rejected", { op, userId, error: String(err) });
  });

  try {
    return await Promise.race([call, timeout]);
  } catch (err) {
    // only the timeout is decided here; adapters map their own failures
    if (!isAnswersError(err)) {
      logger.error("ai_answers_store_failed", { op, userId, error: String(err) });
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
