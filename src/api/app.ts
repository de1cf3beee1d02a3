/**
 * Hono application assembly: request IDs, error boundary and routes.
 */
import { Hono } from "hono";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDependencies, createRoutes } from "./routes.js";

export function createApp(deps: RouteDependencies): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(errorHandler);

  app.route("/", createRoutes(deps));

  return app;
}
