import { Result } from "better-result";
import {
  InvalidParameterError,
  getHttpStatus,
  toErrorBody,
  type PathmeshError,
} from "@pathmesh/errors";
import type { Logger } from "@pathmesh/logger";
import type { TopologyParams } from "@pathmesh/topology";
import type { ControlPlane, ExecSession } from "../services/control-plane";
import type { TopologyRenderer } from "../services/renderer";

export type Query = Record<string, string | undefined>;

export interface RouteContext {
  query: Query;
  logger: Logger;
}

export type HttpMethod = "GET" | "HEAD";

/**
 * One entry of the route table. Every path answers GET; HEAD is served by
 * the application without running the handler.
 */
export interface RouteDefinition {
  path: string;
  methods: HttpMethod[];
  summary: string;
  handle(ctx: RouteContext): Promise<Response>;
}

export interface NetworkRouteDeps {
  controlPlane: ControlPlane;
  renderer: TopologyRenderer;
  /** Used when `/start` omits a size */
  defaults: TopologyParams;
}

const CLOSE = { connection: "close" } as const;

export function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...CLOSE, "content-type": "application/json" },
  });
}

export function errorResponse(error: PathmeshError): Response {
  const status = getHttpStatus(error);
  return json(status, toErrorBody(status, error.message));
}

const message = (text: string) => json(200, { message: text });

const START_PARAMETERS = new Map<string, keyof TopologyParams>([
  ["n_nodes", "nodes"],
  ["n_paths", "paths"],
]);

/**
 * Topology size from `/start` query parameters. Unknown parameters are
 * ignored with a warning.
 */
export function parseStartParams(
  query: Query,
  defaults: TopologyParams,
  logger?: Logger
): Result<TopologyParams, InvalidParameterError> {
  const params: TopologyParams = { ...defaults };

  for (const [key, raw] of Object.entries(query)) {
    const field = START_PARAMETERS.get(key);
    if (field === undefined) {
      logger?.warn("Ignoring unknown start parameter", { parameter: key });
      continue;
    }
    if (raw === undefined || !/^\d+$/.test(raw)) {
      return Result.err(
        new InvalidParameterError({
          message: `${key} must be a positive integer, got '${raw ?? ""}'`,
          parameter: key,
        })
      );
    }
    params[field] = Number(raw);
  }

  return Result.ok(params);
}

/** Output lines buffered for a client before the command is paused */
export const STREAM_HIGH_WATER_MARK = 16;

function streamSession(session: ExecSession, logger: Logger): Response {
  const encoder = new TextEncoder();
  const abort = new AbortController();
  let demand: (() => void) | undefined;

  const wake = () => {
    const resolve = demand;
    demand = undefined;
    resolve?.();
  };

  const body = new ReadableStream<Uint8Array>(
    {
      start(controller) {
        // A write returns only once the client has room for more, so a
        // reader that stops reading pauses the command
        const write = async (chunk: string) => {
          controller.enqueue(encoder.encode(chunk));
          while ((controller.desiredSize ?? 0) <= 0 && !abort.signal.aborted) {
            await new Promise<void>((resolve) => {
              demand = resolve;
            });
          }
        };

        const pump = async () => {
          const result = await session.run({ write, signal: abort.signal });
          if (result.isErr()) {
            logger.error("Streaming exec failed", { node: session.node, error: result.error.message });
          }
          if (!abort.signal.aborted) controller.close();
        };

        pump().catch((error: unknown) => {
          logger.error("Streaming exec crashed", { node: session.node, error: String(error) });
          if (!abort.signal.aborted) controller.error(error);
        });
      },
      pull() {
        wake();
      },
      cancel() {
        abort.abort();
        wake();
      },
    },
    new CountQueuingStrategy({ highWaterMark: STREAM_HIGH_WATER_MARK })
  );

  return new Response(body, {
    status: 200,
    headers: { ...CLOSE, "content-type": "text/plain; charset=utf-8" },
  });
}

/**
 * Route table of the control API, built once at startup
 */
export function networkRoutes({ controlPlane, renderer, defaults }: NetworkRouteDeps): RouteDefinition[] {
  const routes: RouteDefinition[] = [
    {
      path: "/start",
      methods: ["GET", "HEAD"],
      summary: "Build and start the network (n_nodes, n_paths)",
      async handle({ query, logger }) {
        const params = parseStartParams(query, defaults, logger);
        if (params.isErr()) return errorResponse(params.error);

        const started = await controlPlane.start(params.value);
        if (started.isErr()) return errorResponse(started.error);

        const { nodes, paths } = started.value.params;
        return message(`Network started with ${nodes} nodes over ${paths} paths`);
      },
    },
    {
      path: "/stop",
      methods: ["GET", "HEAD"],
      summary: "Tear down the network",
      async handle() {
        const stopped = await controlPlane.stop();
        if (stopped.isErr()) return errorResponse(stopped.error);
        return message(stopped.value ? "Network stopped" : "Network already stopped");
      },
    },
    {
      path: "/exec",
      methods: ["GET", "HEAD"],
      summary: "Run a command on a node (node, command, background)",
      async handle({ query, logger }) {
        const { node, command } = query;
        if (!node || !command) {
          return json(400, { message: "Missing node or command parameter" });
        }
        const background = (query.background ?? "false").toLowerCase() === "true";

        const outcome = await controlPlane.exec(node, command, { streaming: !background });
        if (outcome.isErr()) return errorResponse(outcome.error);

        if (outcome.value.mode === "background") {
          return message(`Background command executed on node '${node}'`);
        }
        return streamSession(outcome.value.session, logger);
      },
    },
    {
      path: "/endpoints",
      methods: ["GET", "HEAD"],
      summary: "List the registered endpoints",
      async handle() {
        return json(
          200,
          routes.map((route) => ({ path: route.path, methods: route.methods }))
        );
      },
    },
    {
      path: "/nodes",
      methods: ["GET", "HEAD"],
      summary: "List the hosts of the running network",
      async handle() {
        const nodes = await controlPlane.listNodes();
        return nodes.isErr() ? errorResponse(nodes.error) : json(200, nodes.value);
      },
    },
    {
      path: "/links",
      methods: ["GET", "HEAD"],
      summary: "List the links of the running network",
      async handle() {
        const links = await controlPlane.listLinks();
        return links.isErr() ? errorResponse(links.error) : json(200, links.value);
      },
    },
    {
      path: "/status",
      methods: ["GET", "HEAD"],
      summary: "Lifecycle state with node and link counts",
      async handle() {
        return json(200, await controlPlane.status());
      },
    },
    {
      path: "/ping_all",
      methods: ["GET", "HEAD"],
      summary: "Ping every related pair of interfaces",
      async handle() {
        const report = await controlPlane.pingAll();
        return report.isErr() ? errorResponse(report.error) : json(200, report.value);
      },
    },
    {
      path: "/start_xterm",
      methods: ["GET", "HEAD"],
      summary: "Open an X terminal on a node (node)",
      async handle({ query }) {
        const { node } = query;
        if (!node) {
          return json(400, { message: "Missing 'node' parameter" });
        }

        const started = await controlPlane.startTerminal(node);
        if (started.isErr()) return errorResponse(started.error);
        return message(`X terminal started for node '${node}'`);
      },
    },
    {
      path: "/visualize",
      methods: ["GET", "HEAD"],
      summary: "Render the running network as an image",
      async handle({ logger }) {
        const snapshot = await controlPlane.snapshot();
        if (snapshot.isErr()) return errorResponse(snapshot.error);

        const image = await renderer.render(snapshot.value);
        if (image.isErr()) {
          logger.error("Rendering failed", { error: image.error.message });
          return errorResponse(image.error);
        }

        return new Response(new Uint8Array(image.value), {
          status: 200,
          headers: { ...CLOSE, "content-type": renderer.contentType },
        });
      },
    },
  ];

  return routes;
}
