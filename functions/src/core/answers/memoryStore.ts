// functions/src/core/answers/memoryStore.ts
// In-process AnswerStore: per-user promise-chain lock around read-modify-write.

import type { AnswerStore } from "./store";
import type { AnswerRecord } from "./types";

function cloneRecord(r: AnswerRecord): AnswerRecord {
  return { ...r, answers: { ...r.answers } };
}

export class MemoryAnswerStore implements AnswerStore {
  private readonly docs = new Map<string, AnswerRecord>();
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(private readonly latencyMs = 0) {}

  private async pause(): Promise<void> {
    if (this.latencyMs <= 0) return;
    await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
  }

  // Runs `fn` after every earlier call for the same userId has settled.
  private withLock<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(userId) ?? Promise.resolve();
    const run = prev.then(fn, fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(userId, tail);

    void tail.then(() => {
      if (this.locks.get(userId) === tail) this.locks.delete(userId);
    });

    return run;
  }

  async get(userId: string): Promise<AnswerRecord | null> {
    await this.pause();
    const doc = this.docs.get(userId);
    return doc ? cloneRecord(doc) : null;
  }

  transact(
    userId: string,
    mutate: (current: AnswerRecord | null) => AnswerRecord
  ): Promise<AnswerRecord> {
    return this.withLock(userId, async () => {
      const current = this.docs.get(userId);
      await this.pause();

      const next = mutate(current ? cloneRecord(current) : null);
      this.docs.set(userId, cloneRecord(next));
      return cloneRecord(next);
    });
  }

  delete(userId: string): Promise<boolean> {
    return this.withLock(userId, async () => {
      await this.pause();
      return this.docs.delete(userId);
    });
  }

  // Raw write for tests that need a pre-existing (possibly stale) document.
  seed(record: AnswerRecord): void {
    this.docs.set(record.userId, cloneRecord(record));
  }

  pendingLocks(): number {
    return this.locks.size;
  }
}
