// functions/src/core/answers/firestoreStore.ts

import { Timestamp, type Firestore } from "firebase-admin/firestore";
import { logger } from "../logging/logger";
import { ConflictRetryExhausted, StoreUnavailableError } from "./errors";
import type { AnswerStore } from "./store";
import { countQuestions, type AnswerRecord, type AnswersMap } from "./types";

// Stored shape: {collection}/{userId}. Field names match documents already in production.
export type AnswerRecordDoc = {
  user_id: string;
  answers: AnswersMap;
  created_at: Timestamp;
  updated_at: Timestamp;
  total_questions: number;
};

// gRPC status codes as reported by @google-cloud/firestore
const GRPC_CANCELLED = 1;
const GRPC_UNKNOWN = 2;
const GRPC_DEADLINE_EXCEEDED = 4;
const GRPC_RESOURCE_EXHAUSTED = 8;
const GRPC_ABORTED = 10;
const GRPC_INTERNAL = 13;
const GRPC_UNAVAILABLE = 14;

const TRANSIENT_CODES = new Set([
  GRPC_CANCELLED,
  GRPC_UNKNOWN,
  GRPC_DEADLINE_EXCEEDED,
  GRPC_RESOURCE_EXHAUSTED,
  GRPC_INTERNAL,
  GRPC_UNAVAILABLE,
]);

function toMillis(v: unknown): number | null {
  if (v instanceof Timestamp) return v.toMillis();
  if (v instanceof Date) return v.getTime();
  if (typeof v === "number" && Number.isFinite(v)) return v;
  return null;
}

export function toAnswerRecordDoc(record: AnswerRecord): AnswerRecordDoc {
  return {
    user_id: record.userId,
    answers: { ...record.answers },
    created_at: Timestamp.fromMillis(record.createdAt),
    updated_at: Timestamp.fromMillis(record.updatedAt),
    total_questions: countQuestions(record.answers),
  };
}

/**
 * Hard-normalizes a stored document. Bad answer entries are dropped (and logged),
 * total_questions is recounted and never read back.
 */
export function parseAnswerRecordDoc(userId: string, d: unknown): AnswerRecord | null {
  if (!d || typeof d !== "object") return null;

  const kept: Array<[string, string]> = [];
  const rawAnswers = "answers" in d ? d.answers : undefined;
  if (rawAnswers && typeof rawAnswers === "object" && !Array.isArray(rawAnswers)) {
    for (const [key, value] of Object.entries(rawAnswers)) {
      if (key.trim() === "" || typeof value !== "string") {
        logger.warn("ai_answers_invalid_stored_entry", { userId, questionId: key });
        continue;
      }
      kept.push([key, value]);
    }
  }
  const answers: AnswersMap = Object.fromEntries(kept);

  const storedCreatedAt = toMillis("created_at" in d ? d.created_at : undefined);
  const updatedAt = toMillis("updated_at" in d ? d.updated_at : undefined) ?? storedCreatedAt ?? 0;
  const createdAt = Math.min(storedCreatedAt ?? updatedAt, updatedAt);

  return {
    userId,
    answers,
    createdAt,
    updatedAt,
    totalQuestions: countQuestions(answers),
  };
}

function grpcCode(err: unknown): number | string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "number" || typeof code === "string" ? code : undefined;
}

// Maps a Firestore failure onto the service taxonomy; anything unrecognized stays as-is.
export function mapFirestoreError(err: unknown): unknown {
  const code = grpcCode(err);
  if (code === GRPC_ABORTED || code === "aborted") {
    return new ConflictRetryExhausted({ cause: err });
  }
  if (typeof code === "number" && TRANSIENT_CODES.has(code)) {
    return new StoreUnavailableError({ cause: err });
  }
  if (code === "unavailable" || code === "deadline-exceeded") {
    return new StoreUnavailableError({ cause: err });
  }
  return err;
}

/**
 * The document operations the store needs, one document per userId.
 * `runTransaction` re-runs `fn` on contention, at most `maxAttempts` times, and
 * rejects with gRPC ABORTED once they are used up.
 */
export type AnswerDocTransaction = {
  read(userId: string): Promise<unknown>;
  write(userId: string, doc: AnswerRecordDoc): void;
  remove(userId: string): void;
};

export type AnswerDocs = {
  read(userId: string): Promise<unknown>;
  runTransaction<T>(fn: (tx: AnswerDocTransaction) => Promise<T>, maxAttempts: number): Promise<T>;
};

// read() resolves to the document data, or undefined when there is no document
export function firestoreAnswerDocs(db: Firestore, collection: string): AnswerDocs {
  const docRef = (userId: string) => db.collection(collection).doc(userId);

  return {
    async read(userId) {
      const snap = await docRef(userId).get();
      return snap.exists ? snap.data() : undefined;
    },

    runTransaction<T>(fn: (tx: AnswerDocTransaction) => Promise<T>, maxAttempts: number): Promise<T> {
      return db.runTransaction(
        (tx) =>
          fn({
            async read(userId) {
              const snap = await tx.get(docRef(userId));
              return snap.exists ? snap.data() : undefined;
            },
            write(userId, doc) {
              tx.set(docRef(userId), doc);
            },
            remove(userId) {
              tx.delete(docRef(userId));
            },
          }),
        { maxAttempts }
      );
    },
  };
}

export type FirestoreAnswerStoreOptions = {
  maxAttempts: number;
};

export class FirestoreAnswerStore implements AnswerStore {
  constructor(
    private readonly docs: AnswerDocs,
    private readonly options: FirestoreAnswerStoreOptions
  ) {}

  async get(userId: string): Promise<AnswerRecord | null> {
    try {
      const data = await this.docs.read(userId);
      return data === undefined ? null : parseAnswerRecordDoc(userId, data);
    } catch (err) {
      throw mapFirestoreError(err);
    }
  }

  async transact(
    userId: string,
    mutate: (current: AnswerRecord | null) => AnswerRecord
  ): Promise<AnswerRecord> {
    try {
      // re-run on contention: each attempt starts again from a fresh read
      return await this.docs.runTransaction(async (tx) => {
        const data = await tx.read(userId);
        const current = data === undefined ? null : parseAnswerRecordDoc(userId, data);

        const next = mutate(current);
        tx.write(userId, toAnswerRecordDoc(next));
        return next;
      }, this.options.maxAttempts);
    } catch (err) {
      throw mapFirestoreError(err);
    }
  }

  async delete(userId: string): Promise<boolean> {
    try {
      // read + delete in one transaction so a concurrent save either wins entirely or is gone
      return await this.docs.runTransaction(async (tx) => {
        const exists = (await tx.read(userId)) !== undefined;
        if (exists) tx.remove(userId);
        return exists;
      }, this.options.maxAttempts);
    } catch (err) {
      throw mapFirestoreError(err);
    }
  }
}
