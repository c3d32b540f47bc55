/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { LinkedTokenService } from "../services/linked-token-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Set by the request-id middleware */
    requestId: string;

    /** The service behind every /api route */
    service: LinkedTokenService;

    /** Set on /api routes by the auth middleware (or the unsecured fallback) */
    auth?: AuthContext;
  };
}
