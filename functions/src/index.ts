// functions/src/index.ts

import { getAuth } from "firebase-admin/auth";
import { getFirestore } from "firebase-admin/firestore";
import { onRequest } from "firebase-functions/v2/https";

import { assertEmulatorSafety, loadConfig } from "./config";
import { FirestoreAnswerStore, firestoreAnswerDocs } from "./core/answers/firestoreStore";
import { createAnswerRecordManager } from "./core/answers/manager";
import { createAnswersHandler } from "./entry/answersHandler";
import { createFirebaseAuthProvider } from "./entry/auth";
import { ensureAdminApp } from "./firebaseAdmin";

const config = loadConfig();
assertEmulatorSafety(config);

const app = ensureAdminApp(config);

const store = new FirestoreAnswerStore(firestoreAnswerDocs(getFirestore(app), config.collection), {
  maxAttempts: config.txMaxAttempts,
});

const manager = createAnswerRecordManager({
  store,
  storeTimeoutMs: config.storeTimeoutMs,
});

// ------------------------------------------------------------
// HTTPS Endpoint: AI answers of the signed-in user
//   POST/GET/DELETE /ai-answers, PUT /ai-answers/{questionId}, GET /ai-answers/stats
// ------------------------------------------------------------
export const aiAnswers = onRequest(
  createAnswersHandler({
    manager,
    resolveUserId: createFirebaseAuthProvider({
      auth: () => getAuth(app),
      emulator: config.emulator,
    }),
  })
);

export const health = onRequest((_req, res) => {
  res.status(200).json({ status: "healthy", timestamp: new Date().toISOString() });
});
