// functions/src/core/logging/logger.ts
import * as logger from "firebase-functions/logger";

/**
 * Single logger for the answers service.
 * Only this module depends on firebase-functions/logger directly.
 */
export { logger };
