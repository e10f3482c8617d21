import { Elysia, type ElysiaConfig } from "elysia";
import { swagger } from "@elysiajs/swagger";
import { RouteNotFoundError } from "@pathmesh/errors";
import { createLogger, generateCorrelationId, type LogLevel } from "@pathmesh/logger";
import type { TopologyParams } from "@pathmesh/topology";
import { errorResponse, json, networkRoutes } from "./routes/network";
import type { ControlPlane } from "./services/control-plane";
import type { TopologyRenderer } from "./services/renderer";

export interface AppOptions {
  controlPlane: ControlPlane;
  renderer: TopologyRenderer;
  defaults: TopologyParams;
  logLevel?: LogLevel;
  /** Serve OpenAPI documentation at /docs (default: true) */
  docsEnabled?: boolean;
  /** Runtime adapter; the web-standard one when omitted */
  adapter?: ElysiaConfig<"">["adapter"];
}

export function createApp(options: AppOptions) {
  const minLevel = options.logLevel ?? "info";
  const appLogger = createLogger({ correlationId: "app", component: "http" }, { minLevel });
  const routes = networkRoutes(options);

  const base = new Elysia({ adapter: options.adapter });

  if (options.docsEnabled ?? true) {
    base.use(
      swagger({
        documentation: {
          info: {
            title: "pathmesh API",
            version: "0.1.0",
            description: "Control API for a multi-path multicast network emulation",
          },
          tags: [
            {
              name: "network",
              description: "Network lifecycle, command execution and introspection",
            },
          ],
        },
        path: "/docs",
        exclude: ["/docs", "/docs/json"],
      })
    );
  }

  const app = base
    // Persistent connections are not supported
    .onRequest(({ set }) => {
      set.headers["connection"] = "close";
    })

    // Add correlation ID and logger to request context
    .derive(({ request }) => {
      const correlationId =
        request.headers.get("x-correlation-id") || generateCorrelationId();
      const logger = createLogger(
        {
          correlationId,
          path: new URL(request.url).pathname,
          method: request.method,
        },
        { minLevel }
      );
      return { correlationId, logger };
    })

    .onError(({ code, error, request }) => {
      if (code === "NOT_FOUND") {
        return errorResponse(
          new RouteNotFoundError({
            message: "Not found",
            path: new URL(request.url).pathname,
            method: request.method,
          })
        );
      }

      const message = error instanceof Error ? error.message : String(error);
      appLogger.error(`Request failed: ${message}`, {
        code,
        stack: error instanceof Error ? error.stack : undefined,
      });
      return json(500, { error: message });
    });

  for (const route of routes) {
    app.get(
      route.path,
      ({ query, logger }) => {
        logger.debug("Handling request", { query });
        return route.handle({ query, logger });
      },
      { detail: { summary: route.summary, tags: ["network"] } }
    );
    app.head(route.path, () => new Response(null, { status: 200, headers: { connection: "close" } }), {
      detail: { hide: true },
    });
  }

  return app;
}
