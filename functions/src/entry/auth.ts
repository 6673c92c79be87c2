// functions/src/entry/auth.ts

import { Unauthenticated } from "../core/answers/errors";
import { logger } from "../core/logging/logger";

// Resolves the Authorization header of a request to a verified, non-empty uid.
export type AuthContextProvider = (authorizationHeader: string | undefined) => Promise<string>;

// The slice of firebase-admin's Auth used here
export type IdTokenVerifier = {
  verifyIdToken(idToken: string): Promise<{ uid: string }>;
};

export function readBearerToken(header: string | undefined): string {
  const h = (header ?? "").trim();
  return h.startsWith("Bearer ") ? h.slice("Bearer ".length).trim() : "";
}

function errorCode(err: unknown): string {
  if (!err || typeof err !== "object" || !("code" in err)) return "";
  return typeof err.code === "string" ? err.code : "";
}

/**
 * Emulator tokens are unsigned (alg=none, empty signature), so verifyIdToken
 * rejects them. Only ever called when running against the emulators.
 */
export function decodeEmulatorToken(token: string): string | null {
  const parts = token.split(".");
  if (parts.length < 2 || !parts[1]) return null;

  try {
    const payload: unknown = JSON.parse(Buffer.from(parts[1], "base64url").toString("utf8"));
    if (!payload || typeof payload !== "object") return null;

    const claims = new Map<string, unknown>(Object.entries(payload));
    // emulator puts the uid in user_id; uid/sub as fallbacks
    for (const key of ["user_id", "uid", "sub"]) {
      const v = claims.get(key);
      if (typeof v === "string" && v.trim()) return v.trim();
    }
    return null;
  } catch (err) {
    logger.debug("emulator_token_decode_failed", { error: String(err) });
    return null;
  }
}

export function createFirebaseAuthProvider(opts: {
  auth: () => IdTokenVerifier;
  emulator: boolean;
}): AuthContextProvider {
  return async function resolveUserId(authorizationHeader) {
    const token = readBearerToken(authorizationHeader);
    if (!token) {
      throw new Unauthenticated("Missing Authorization Bearer token");
    }

    if (opts.emulator) {
      const uid = decodeEmulatorToken(token);
      if (uid) return uid;
    }

    try {
      const decoded = await opts.auth().verifyIdToken(token);
      if (!decoded.uid) {
        throw new Unauthenticated("Invalid authentication token");
      }
      logger.info("ai_answers_authenticated", { userId: decoded.uid });
      return decoded.uid;
    } catch (err) {
      if (err instanceof Unauthenticated) throw err;

      const code = errorCode(err);
      logger.warn("ai_answers_auth_failed", { code });

      if (code === "auth/id-token-expired") {
        throw new Unauthenticated("Authentication token has expired", { cause: err });
      }
      if (code === "auth/id-token-revoked" || code === "auth/argument-error") {
        throw new Unauthenticated("Invalid authentication token", { cause: err });
      }
      throw new Unauthenticated("Authentication failed", { cause: err });
    }
  };
}
