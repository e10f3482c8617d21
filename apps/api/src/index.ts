import { node } from "@elysiajs/node";
import { createLogger } from "@pathmesh/logger";
import { LinuxFabricFactory, NodeConfigurator, createShellRunner } from "@pathmesh/network";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { preflight } from "./preflight";
import { ControlPlane } from "./services/control-plane";
import { GraphvizRenderer } from "./services/renderer";

async function main() {
  const config = loadConfig();
  if (config.isErr()) {
    console.error("Invalid configuration:", config.error.message);
    process.exit(1);
  }

  const {
    port,
    host,
    logLevel,
    defaultNodes,
    defaultPaths,
    namespacePrefix,
    relayDaemon,
    relayControl,
    natSubnet,
    externalInterface,
    tuneHostBuffers,
    docsEnabled,
    skipPreflight,
  } = config.value;

  const logger = createLogger({ correlationId: "main", component: "server" }, { minLevel: logLevel });
  const runner = createShellRunner();

  if (skipPreflight) {
    logger.warn("Skipping startup checks");
  } else {
    const checked = await preflight({ runner, relayDaemon, relayControl, uid: process.getuid?.() });
    if (checked.isErr()) {
      console.error("Startup check failed:", checked.error.message);
      process.exit(1);
    }
  }

  const controlPlane = new ControlPlane({
    fabricFactory: new LinuxFabricFactory({
      runner,
      namespacePrefix,
      nat: { subnet: natSubnet, externalInterface },
      logger: logger.child({ component: "fabric" }),
    }),
    configurator: new NodeConfigurator({
      relay: { daemon: relayDaemon, control: relayControl },
      logger: logger.child({ component: "configurator" }),
    }),
    tuneHostBuffers,
    logger: logger.child({ component: "control-plane" }),
  });

  const app = createApp({
    controlPlane,
    renderer: new GraphvizRenderer(runner),
    defaults: { nodes: defaultNodes, paths: defaultPaths },
    logLevel,
    docsEnabled,
    adapter: node(),
  });

  app.listen({ port, hostname: host }, () => {
    logger.info(`pathmesh API running at http://${host}:${port}`);
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down HTTP server and stopping network", { signal });
    await controlPlane.shutdown();
    await app.stop();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
