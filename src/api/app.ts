/**
 * Hono application - middleware, error boundary and routes.
 */
import { Hono } from "hono";

import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDeps, createRoutes } from "./routes.js";

export function createApp(deps: RouteDeps): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(errorHandler);

  app.route("/", createRoutes(deps));

  return app;
}
