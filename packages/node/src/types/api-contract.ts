/**
 * Per-request context shared by the middleware chain and the routes.
 */

import type { CustodyService } from "../services/custody-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    requestId: string;
    service: CustodyService;
    /** Caller identity; from credentials, or X-Principal in unsecured mode */
    auth: AuthContext;
  };
}
