// functions/src/config.ts

import dotenv from "dotenv";

// .env in the functions folder
dotenv.config();

export type AnswersConfig = {
  collection: string;
  storeTimeoutMs: number;
  txMaxAttempts: number;
  serviceAccountJson: string;
  serviceAccountPath: string;
  emulator: boolean;
  functionsEmulator: boolean;
  firestoreEmulatorHost: string;
};

type Env = Record<string, string | undefined>;

const DEFAULT_COLLECTION = "ai_answers";
const DEFAULT_STORE_TIMEOUT_MS = 5000;
const DEFAULT_TX_MAX_ATTEMPTS = 5;

function asString(v: string | undefined): string {
  return (v ?? "").trim();
}

function asPositiveInt(v: string | undefined, fallback: number): number {
  const n = Number(asString(v));
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function isTrue(v: string | undefined): boolean {
  const s = asString(v).toLowerCase();
  return s === "true" || s === "1";
}

export function loadConfig(env: Env = process.env): AnswersConfig {
  const functionsEmulator = isTrue(env.FUNCTIONS_EMULATOR);
  const firestoreEmulatorHost = asString(env.FIRESTORE_EMULATOR_HOST);

  const anyEmulator =
    functionsEmulator ||
    asString(env.FIREBASE_EMULATOR_HUB) !== "" ||
    firestoreEmulatorHost !== "" ||
    asString(env.FIREBASE_AUTH_EMULATOR_HOST) !== "";

  return {
    collection: asString(env.AI_ANSWERS_COLLECTION) || DEFAULT_COLLECTION,
    storeTimeoutMs: asPositiveInt(env.AI_ANSWERS_STORE_TIMEOUT_MS, DEFAULT_STORE_TIMEOUT_MS),
    txMaxAttempts: asPositiveInt(env.AI_ANSWERS_TX_MAX_ATTEMPTS, DEFAULT_TX_MAX_ATTEMPTS),
    serviceAccountJson: asString(env.FIREBASE_SERVICE_ACCOUNT),
    serviceAccountPath: asString(env.FIREBASE_SERVICE_ACCOUNT_PATH),
    emulator: anyEmulator && !isTrue(env.DEV_FORCE_DISABLE),
    functionsEmulator,
    firestoreEmulatorHost,
  };
}

/**
 * SAFETY GUARD: under the functions emulator, Firestore must be emulated too,
 * otherwise writes would hit the real project.
 */
export function assertEmulatorSafety(config: AnswersConfig): void {
  if (config.functionsEmulator && !config.firestoreEmulatorHost) {
    throw new Error(
      "SAFETY GUARD: FIRESTORE_EMULATOR_HOST is not set while running in the functions emulator. " +
        "Start: firebase emulators:start --only functions,firestore,auth"
    );
  }
}
