// functions/src/entry/answersRouter.ts

import { isAnswersError, ValidationError } from "../core/answers/errors";
import type { AnswerRecordManager } from "../core/answers/manager";
import { parseSaveAnswersBody, parseSingleAnswer } from "../core/answers/validate";
import { logger } from "../core/logging/logger";
import type { AuthContextProvider } from "./auth";

export type AnswersHttpRequest = {
  method: string;
  path: string;
  authorization?: string;
  body: unknown;
  query: Record<string, unknown>;
};

export type AnswersHttpResponse = {
  status: number;
  body: Record<string, unknown>;
};

export type AnswersRouterDeps = {
  manager: AnswerRecordManager;
  resolveUserId: AuthContextProvider;
};

type Route =
  | { kind: "collection" }
  | { kind: "stats" }
  | { kind: "question"; questionId: string }
  | { kind: "unknown" };

const BASE = "/ai-answers";

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function fail(status: number, message: string, errorCode: string): AnswersHttpResponse {
  return { status, body: { success: false, message, error_code: errorCode } };
}

export function matchRoute(rawPath: string): Route {
  // mounted either at the function root or behind /api
  let path = rawPath.trim().replace(/\/+$/, "");
  if (path.startsWith("/api/")) path = path.slice("/api".length);

  if (path === BASE) return { kind: "collection" };
  if (path === `${BASE}/stats`) return { kind: "stats" };

  if (path.startsWith(`${BASE}/`)) {
    const segment = path.slice(BASE.length + 1);
    if (!segment || segment.includes("/")) return { kind: "unknown" };
    try {
      return { kind: "question", questionId: decodeURIComponent(segment) };
    } catch {
      return { kind: "unknown" };
    }
  }

  return { kind: "unknown" };
}

function allowedMethods(route: Route): string[] {
  switch (route.kind) {
    case "collection":
      return ["GET", "POST", "DELETE"];
    case "stats":
      return ["GET"];
    case "question":
      return ["PUT"];
    case "unknown":
      return [];
  }
}

// Bodies can arrive as a raw JSON string depending on the client's content-type.
function normalizeBody(body: unknown): unknown {
  if (typeof body !== "string") return body;
  if (body.trim() === "") return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    throw new ValidationError("body", "Invalid JSON body");
  }
}

async function dispatch(
  deps: AnswersRouterDeps,
  route: Route,
  method: string,
  userId: string,
  req: AnswersHttpRequest
): Promise<AnswersHttpResponse> {
  const { manager } = deps;

  if (route.kind === "collection" && method === "POST") {
    const answers = parseSaveAnswersBody(normalizeBody(req.body));
    const { record, created } = await manager.saveAnswers(userId, answers);
    return {
      status: created ? 201 : 200,
      body: {
        success: true,
        message: "AI answers saved successfully",
        answers: record.answers,
        saved_at: iso(record.updatedAt),
        created_at: iso(record.createdAt),
        updated_at: iso(record.updatedAt),
        total_questions: record.totalQuestions,
      },
    };
  }

  if (route.kind === "collection" && method === "GET") {
    const record = await manager.getAnswers(userId);
    return {
      status: 200,
      body: {
        success: true,
        message: "AI answers retrieved successfully",
        answers: record.answers,
        saved_at: iso(record.createdAt),
        updated_at: iso(record.updatedAt),
        total_questions: record.totalQuestions,
      },
    };
  }

  if (route.kind === "collection" && method === "DELETE") {
    await manager.deleteAnswers(userId);
    return { status: 200, body: { success: true, message: "AI answers deleted successfully" } };
  }

  if (route.kind === "stats") {
    const stats = await manager.getStats(userId);
    return {
      status: 200,
      body: {
        success: true,
        total_questions: stats.totalQuestions,
        completed_questions: stats.completedQuestions,
        completion_percentage: stats.completionPercentage,
        created_at: iso(stats.createdAt),
        updated_at: iso(stats.updatedAt),
      },
    };
  }

  if (route.kind === "question") {
    const answer = parseSingleAnswer(normalizeBody(req.body), req.query.answer);
    const { record } = await manager.updateSingleAnswer(userId, route.questionId, answer);
    return {
      status: 200,
      body: {
        success: true,
        message: `Answer for question ${route.questionId} updated successfully`,
        answers: record.answers,
        updated_at: iso(record.updatedAt),
        total_questions: record.totalQuestions,
      },
    };
  }

  return fail(404, "Not found", "NOT_FOUND");
}

export async function routeAnswersRequest(
  deps: AnswersRouterDeps,
  req: AnswersHttpRequest
): Promise<AnswersHttpResponse> {
  const route = matchRoute(req.path);
  const method = req.method.toUpperCase();

  if (route.kind === "unknown") {
    return fail(404, "Not found", "NOT_FOUND");
  }
  if (!allowedMethods(route).includes(method)) {
    return fail(405, `Method ${method} not allowed`, "METHOD_NOT_ALLOWED");
  }

  let userId = "";
  try {
    // no store access before the caller is known
    userId = await deps.resolveUserId(req.authorization);
    return await dispatch(deps, route, method, userId, req);
  } catch (err) {
    if (isAnswersError(err)) {
      if (err.httpStatus >= 500) {
        logger.warn("ai_answers_request_unavailable", { userId, code: err.code, cause: String(err.cause) });
      }
      return fail(err.httpStatus, err.message, err.code);
    }

    logger.error("ai_answers_request_failed", { userId, method, path: req.path, error: String(err) });
    return fail(500, "Internal server error", "INTERNAL");
  }
}
