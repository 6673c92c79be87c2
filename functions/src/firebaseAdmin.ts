// functions/src/firebaseAdmin.ts

import { applicationDefault, cert, getApps, initializeApp, type App, type ServiceAccount } from "firebase-admin/app";
import type { AnswersConfig } from "./config";
import { logger } from "./core/logging/logger";

function pick(fields: Map<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = fields.get(k);
    if (typeof v === "string" && v) return v;
  }
  return undefined;
}

// Accepts the downloaded service-account JSON (snake_case) or the camelCase form.
export function parseServiceAccount(json: string): ServiceAccount {
  const raw: unknown = JSON.parse(json);
  if (!raw || typeof raw !== "object") {
    throw new Error("FIREBASE_SERVICE_ACCOUNT is not a JSON object");
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  return {
    projectId: pick(fields, "project_id", "projectId"),
    clientEmail: pick(fields, "client_email", "clientEmail"),
    privateKey: pick(fields, "private_key", "privateKey"),
  };
}

// Admin SDK init (idempotent)
export function ensureAdminApp(config: AnswersConfig): App {
  const existing = getApps()[0];
  if (existing) return existing;

  if (config.serviceAccountJson) {
    logger.info("firebase_admin_init", { credentials: "env" });
    return initializeApp({ credential: cert(parseServiceAccount(config.serviceAccountJson)) });
  }

  if (config.serviceAccountPath) {
    logger.info("firebase_admin_init", { credentials: "file" });
    return initializeApp({ credential: cert(config.serviceAccountPath) });
  }

  if (config.emulator) {
    logger.info("firebase_admin_init", { credentials: "emulator" });
    return initializeApp();
  }

  logger.info("firebase_admin_init", { credentials: "application_default" });
  return initializeApp({ credential: applicationDefault() });
}
