/**
 * Hono application environment type.
 *
 * Both variables are set by the request context middleware, which runs
 * first; route handlers and the error handler read them via c.get().
 */

import type { Logger } from "pino";

export interface AppEnv {
  Variables: {
    /** X-Request-Id of the request, generated when the client sent none */
    requestId: string;
    /** Child of the app logger bound to `requestId` */
    log: Logger;
  };
}
