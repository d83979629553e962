#!/usr/bin/env node
/**
 * Taskdeck bridge entry point
 *
 * Serves one catalog session over stdin/stdout. Logs go to the log file
 * (and stderr with --debug); stdout carries protocol lines only.
 */

import { Effect } from "effect";
import { loadEnvFile, resolveConfig } from "./config.js";
import { makeRpcContext } from "./rpc/context.js";
import { bridgeRouter } from "./rpc/router.js";
import { serveLines } from "./rpc/server.js";
import { makeBridgeRuntime } from "./runtime.js";

async function main(): Promise<void> {
  loadEnvFile();
  const { config, configPath, problems, unknownArgs } = resolveConfig({
    argv: process.argv.slice(2),
    env: process.env,
  });

  const runtime = makeBridgeRuntime(config, configPath);

  const program = Effect.gen(function* () {
    for (const problem of problems) {
      yield* Effect.logWarning(`[Bridge] ${problem.message}; using defaults`);
    }
    if (unknownArgs.length > 0) {
      yield* Effect.logWarning(
        `[Bridge] Ignoring unknown arguments: ${unknownArgs.join(" ")}`,
      );
    }
    yield* Effect.logInfo(
      `[Bridge] Serving ${config.catalogPath} (validate=${!config.overrideValidation})`,
    );

    const ctx = yield* makeRpcContext;
    yield* serveLines({
      input: process.stdin,
      write: (line) => {
        process.stdout.write(`${line}\n`);
      },
      router: bridgeRouter,
      ctx,
    });

    yield* Effect.logInfo("[Bridge] Input closed, shutting down");
  });

  try {
    await runtime.runPromise(program);
  } finally {
    await runtime.dispose();
  }
}

main().catch((err) => {
  console.error("[Bridge] Fatal error:", err);
  process.exit(1);
});
