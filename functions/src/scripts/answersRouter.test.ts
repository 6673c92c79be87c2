// functions/src/scripts/answersRouter.test.ts
import assert from "assert";
import { describe, test } from "node:test";
import { StoreUnavailableError, Unauthenticated } from "../core/answers/errors";
import { mapFirestoreError } from "../core/answers/firestoreStore";
import { createAnswerRecordManager } from "../core/answers/manager";
import { MemoryAnswerStore } from "../core/answers/memoryStore";
import type { AnswerStore } from "../core/answers/store";
import { matchRoute, routeAnswersRequest, type AnswersHttpRequest } from "../entry/answersRouter";

function setup(store: AnswerStore = new MemoryAnswerStore()) {
  const clock = { t: Date.UTC(2024, 0, 1) };
  const manager = createAnswerRecordManager({ store, storeTimeoutMs: 1_000, now: () => clock.t });
  const deps = {
    manager,
    resolveUserId: async (header: string | undefined) => {
      if (header === "Bearer test-token") return "user-1";
      throw new Unauthenticated("Invalid authentication token");
    },
  };

  const call = (req: Partial<AnswersHttpRequest> & { method: string; path: string }) =>
    routeAnswersRequest(deps, { authorization: "Bearer test-token", body: undefined, query: {}, ...req });

  return { clock, call };
}

describe("matchRoute", () => {
  test("accepts the /api prefix and a trailing slash", () => {
    assert.deepStrictEqual(matchRoute("/api/ai-answers/"), { kind: "collection" });
    assert.deepStrictEqual(matchRoute("/ai-answers/stats"), { kind: "stats" });
  });

  test("decodes the question id segment", () => {
    assert.deepStrictEqual(matchRoute("/ai-answers/q%201"), { kind: "question", questionId: "q 1" });
  });

  test("unknown and nested paths do not match", () => {
    assert.deepStrictEqual(matchRoute("/other"), { kind: "unknown" });
    assert.deepStrictEqual(matchRoute("/ai-answers/1/extra"), { kind: "unknown" });
  });
});

describe("routeAnswersRequest", () => {
  test("first save is 201, later saves are 200", async () => {
    const { call, clock } = setup();

    const first = await call({ method: "POST", path: "/api/ai-answers", body: { answers: { "1": "I value honesty" } } });
    assert.equal(first.status, 201);
    assert.deepStrictEqual(first.body, {
      success: true,
      message: "AI answers saved successfully",
      answers: { "1": "I value honesty" },
      saved_at: "2024-01-01T00:00:00.000Z",
      created_at: "2024-01-01T00:00:00.000Z",
      updated_at: "2024-01-01T00:00:00.000Z",
      total_questions: 1,
    });

    clock.t += 60_000;
    const second = await call({ method: "POST", path: "/api/ai-answers", body: '{"answers":{"2":"Hiking"}}' });
    assert.equal(second.status, 200);
    assert.deepStrictEqual(second.body.answers, { "1": "I value honesty", "2": "Hiking" });
    assert.equal(second.body.created_at, "2024-01-01T00:00:00.000Z");
    assert.equal(second.body.updated_at, "2024-01-01T00:01:00.000Z");
  });

  test("get returns the stored answers", async () => {
    const { call } = setup();
    await call({ method: "POST", path: "/ai-answers", body: { answers: { "1": "a" } } });

    const res = await call({ method: "GET", path: "/ai-answers" });
    assert.equal(res.status, 200);
    assert.deepStrictEqual(res.body, {
      success: true,
      message: "AI answers retrieved successfully",
      answers: { "1": "a" },
      saved_at: "2024-01-01T00:00:00.000Z",
      updated_at: "2024-01-01T00:00:00.000Z",
      total_questions: 1,
    });
  });

  test("put updates a single answer from the body or the query", async () => {
    const { call } = setup();
    await call({ method: "POST", path: "/ai-answers", body: { answers: { "1": "a", "2": "b" } } });

    const viaBody = await call({ method: "PUT", path: "/ai-answers/1", body: { answer: "Honesty and trust" } });
    assert.equal(viaBody.status, 200);
    assert.equal(viaBody.body.message, "Answer for question 1 updated successfully");
    assert.deepStrictEqual(viaBody.body.answers, { "1": "Honesty and trust", "2": "b" });

    const viaQuery = await call({ method: "PUT", path: "/ai-answers/3", query: { answer: "c" } });
    assert.equal(viaQuery.body.total_questions, 3);
  });

  test("stats reports counts and timestamps", async () => {
    const { call } = setup();
    await call({ method: "POST", path: "/ai-answers", body: { answers: { "1": "a", "2": "" } } });

    const res = await call({ method: "GET", path: "/ai-answers/stats" });
    assert.deepStrictEqual(res, {
      status: 200,
      body: {
        success: true,
        total_questions: 2,
        completed_questions: 1,
        completion_percentage: 50,
        created_at: "2024-01-01T00:00:00.000Z",
        updated_at: "2024-01-01T00:00:00.000Z",
      },
    });
  });

  test("delete is 200 whether or not answers existed, then get is 404", async () => {
    const { call } = setup();
    await call({ method: "POST", path: "/ai-answers", body: { answers: { "1": "a" } } });

    assert.equal((await call({ method: "DELETE", path: "/ai-answers" })).status, 200);
    assert.equal((await call({ method: "DELETE", path: "/ai-answers" })).status, 200);

    const res = await call({ method: "GET", path: "/ai-answers" });
    assert.deepStrictEqual(res, {
      status: 404,
      body: { success: false, message: "No AI answers found for user", error_code: "NOT_FOUND" },
    });
  });

  test("validation failures are 400", async () => {
    const { call } = setup();

    const empty = await call({ method: "POST", path: "/ai-answers", body: { answers: {} } });
    assert.deepStrictEqual(empty.body, { success: false, message: "Answers cannot be empty", error_code: "VALIDATION_ERROR" });

    const badJson = await call({ method: "POST", path: "/ai-answers", body: "{nope" });
    assert.equal(badJson.status, 400);
    assert.equal(badJson.body.message, "Invalid JSON body");

    const blankId = await call({ method: "PUT", path: "/ai-answers/%20", body: { answer: "x" } });
    assert.equal(blankId.status, 400);
    assert.equal(blankId.body.message, "Question id cannot be empty");
  });

  test("unauthenticated requests are 401 and never touch the store", async () => {
    let storeCalls = 0;
    const inner = new MemoryAnswerStore();
    const counting: AnswerStore = {
      get: (u) => {
        storeCalls += 1;
        return inner.get(u);
      },
      transact: (u, m) => {
        storeCalls += 1;
        return inner.transact(u, m);
      },
      delete: (u) => {
        storeCalls += 1;
        return inner.delete(u);
      },
    };
    const { call } = setup(counting);

    const res = await call({ method: "POST", path: "/ai-answers", authorization: undefined, body: { answers: { "1": "a" } } });
    assert.deepStrictEqual(res, {
      status: 401,
      body: { success: false, message: "Invalid authentication token", error_code: "UNAUTHENTICATED" },
    });
    assert.equal(storeCalls, 0);
  });

  test("store outages are 503", async () => {
    const down: AnswerStore = {
      get: () => Promise.reject(mapFirestoreError(Object.assign(new Error("14 UNAVAILABLE: internal-host"), { code: 14 }))),
      transact: () => Promise.reject(new Error("unused")),
      delete: () => Promise.reject(new Error("unused")),
    };
    const { call } = setup(down);

    const res = await call({ method: "GET", path: "/ai-answers/stats" });
    assert.deepStrictEqual(res, {
      status: 503,
      body: { success: false, message: "Answer store is temporarily unavailable", error_code: "STORE_UNAVAILABLE" },
    });
  });

  test("store errors that are not outages are 500, not retryable 503", async () => {
    const denied = Object.assign(new Error("7 PERMISSION_DENIED: internal-host"), { code: 7 });
    const failing: AnswerStore = {
      get: () => Promise.reject(mapFirestoreError(denied)),
      transact: () => Promise.reject(new StoreUnavailableError()),
      delete: () => Promise.reject(new TypeError("x is undefined")),
    };
    const { call } = setup(failing);

    const internal = { success: false, message: "Internal server error", error_code: "INTERNAL" };
    assert.deepStrictEqual(await call({ method: "GET", path: "/ai-answers" }), { status: 500, body: internal });
    assert.deepStrictEqual(await call({ method: "DELETE", path: "/ai-answers" }), { status: 500, body: internal });
  });

  test("reserved question ids are 400 before the store is reached", async () => {
    const { call } = setup();

    const reserved = await call({ method: "POST", path: "/ai-answers", body: { answers: { __x__: "v" } } });
    assert.deepStrictEqual(reserved, {
      status: 400,
      body: { success: false, message: "Question id __x__ is reserved", error_code: "VALIDATION_ERROR" },
    });

    const proto = await call({ method: "POST", path: "/ai-answers", body: '{"answers":{"__proto__":"x","a":"y"}}' });
    assert.equal(proto.status, 400);
    assert.equal(proto.body.message, "Question id __proto__ is reserved");

    assert.equal((await call({ method: "GET", path: "/ai-answers" })).status, 404);
  });

  test("unknown paths are 404 and wrong methods 405", async () => {
    const { call } = setup();
    assert.equal((await call({ method: "GET", path: "/elsewhere" })).status, 404);
    assert.equal((await call({ method: "PATCH", path: "/ai-answers" })).status, 405);
    assert.equal((await call({ method: "POST", path: "/ai-answers/stats" })).status, 405);
  });
});
