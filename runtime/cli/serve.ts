import type http from "node:http";
import { ERROR_POLICY_REGISTRY } from "../../src/adapter/_shared/error_policy_registry";
import { startWebServer } from "../../src/adapters/web";
import { PaintCooldown } from "../../src/core/canvas/paint_cooldown";
import { toCoreError } from "../../src/core/errors/core.errors";
import { describeServiceConfig, loadServiceConfig } from "../config";
import { openStoreRuntime, type StoreRuntime } from "../store/store_runtime";
import { parseServeArgs } from "./serve.args";

// One process per store file: the write serializer only guarantees a single
// writer inside this process.

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}

let runtime: StoreRuntime | null = null;

try {
  const config = loadServiceConfig(process.env, parseServeArgs(process.argv.slice(2)));
  if (config.sessionSecret.isDefault) {
    console.warn("[serve] SESSION_SECRET is left at its default; override it outside local development.");
  }
  console.log(`[serve] starting ${describeServiceConfig(config)}`);

  const storeRuntime = openStoreRuntime({
    dbPath: config.dbPath,
    readPoolSize: config.readPoolSize,
    busyTimeoutMs: config.busyTimeoutMs,
    writeRetry: config.writeRetry,
    shutdownGraceMs: config.shutdownGraceMs,
    onWarn: (message) => console.warn(message),
  });
  runtime = storeRuntime;

  const server = startWebServer({
    host: config.host,
    port: config.port,
    deps: {
      writer: storeRuntime.writer,
      reader: storeRuntime.readPool,
      secret: config.sessionSecret,
      paintCooldown: new PaintCooldown({ cooldownMs: config.paintCooldownMs }),
      requestDeadlineMs: config.requestDeadlineMs,
    },
  });
  server.on("error", (error) => {
    console.error(`[serve] server error: ${error.message}`);
    process.exitCode = 1;
    storeRuntime.close(0).catch((closeError: unknown) => {
      console.error(`[serve] store close failed: ${String(closeError)}`);
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[serve] ${signal} received, draining writes (grace=${String(config.shutdownGraceMs)}ms)`);
    const serverClosed = closeServer(server);
    await storeRuntime.close(config.shutdownGraceMs);
    await serverClosed;
    console.log("[serve] store closed, bye");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`[serve] shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      });
    });
  }
} catch (error) {
  const coreError = toCoreError(error);
  console.error(`[serve] startup failed ${coreError.code}: ${coreError.message}`);
  if (runtime !== null) {
    await runtime.close(0);
  }
  process.exitCode = ERROR_POLICY_REGISTRY[coreError.code].cliExitCode;
}
