/**
 * Shared test catalog and service doubles
 */

import type {
  BusyIndicatorMode,
  CatalogCategory,
  CatalogNode,
  ExecutionResult,
} from "@taskdeck/catalog-protocol";
import { Deferred, Effect, Either, Layer } from "effect";
import { CatalogCacheLive } from "../catalog-cache.js";
import { CatalogProvider } from "../catalog-provider.js";
import { makeCatalogSessionLive } from "../catalog-session.js";
import { CommandRunner } from "../command-runner.js";
import { CatalogLoadError } from "../errors.js";
import { makeExecutionCoordinatorLive } from "../execution-coordinator.js";
import { type CatalogSnapshot, makeSnapshot } from "../snapshot.js";
import type { ExecutionRequest } from "../types.js";

export function node(
  fields: Pick<CatalogNode, "id" | "name"> & Partial<CatalogNode>,
): CatalogNode {
  return {
    description: "",
    tags: [],
    multiSelect: false,
    children: [],
    command: { type: "none" },
    ...fields,
  };
}

export function buildSnapshot(
  categories: CatalogCategory[],
  nodes: CatalogNode[],
): CatalogSnapshot {
  return Either.getOrThrow(makeSnapshot(categories, nodes));
}

/**
 * Utilities
 *   System (directory)
 *     Kernel Info  (multi-select)
 *     Disk Usage
 *   Update         (multi-select, `echo ok`)
 * Applications
 *   Browser        (multi-select)
 *   Editors        (multi-select directory)
 *     Vim
 */
export function sampleSnapshot(): CatalogSnapshot {
  return buildSnapshot(
    [
      { name: "Utilities", rootId: "root-u" },
      { name: "Applications", rootId: "root-a" },
    ],
    [
      node({ id: "root-u", name: "Utilities", children: ["system", "update"] }),
      node({
        id: "system",
        name: "System",
        description: "System tools",
        children: ["kernel", "disk"],
      }),
      node({
        id: "kernel",
        name: "Kernel Info",
        description: "Print the kernel release",
        multiSelect: true,
        command: { type: "raw", command: "echo kernel" },
      }),
      node({
        id: "disk",
        name: "Disk Usage",
        description: "Show free space",
        command: { type: "raw", command: "echo disk" },
      }),
      node({
        id: "update",
        name: "Update",
        description: "Refresh package lists",
        tags: ["I"],
        multiSelect: true,
        command: { type: "raw", command: "echo ok" },
      }),
      node({ id: "root-a", name: "Applications", children: ["browser", "editors"] }),
      node({
        id: "browser",
        name: "Browser",
        multiSelect: true,
        command: { type: "raw", command: "echo browser" },
      }),
      node({
        id: "editors",
        name: "Editors",
        multiSelect: true,
        children: ["vim"],
      }),
      node({
        id: "vim",
        name: "Vim",
        command: { type: "raw", command: "echo vim" },
      }),
    ],
  );
}

/**
 * Provider double that records the validate flag of every call
 */
export function makeCountingProvider(
  snapshot: () => CatalogSnapshot = sampleSnapshot,
) {
  const calls: boolean[] = [];
  const layer = Layer.succeed(CatalogProvider, {
    getCatalog: (validate: boolean) =>
      Effect.sync(() => {
        calls.push(validate);
        return snapshot();
      }),
  });
  return { calls, layer };
}

/**
 * Counting provider that takes `millis` of wall-clock time per call
 */
export function makeSlowProvider(
  millis: number,
  snapshot: () => CatalogSnapshot = sampleSnapshot,
) {
  const calls: boolean[] = [];
  const layer = Layer.succeed(CatalogProvider, {
    getCatalog: (validate: boolean) =>
      Effect.sleep(millis).pipe(
        Effect.zipRight(
          Effect.sync(() => {
            calls.push(validate);
            return snapshot();
          }),
        ),
      ),
  });
  return { calls, layer };
}

export const FailingProviderLive = Layer.succeed(CatalogProvider, {
  getCatalog: () =>
    Effect.fail(new CatalogLoadError({ message: "catalog unavailable" })),
});

/**
 * Runner double that records requests and succeeds with "ran <name>"
 */
export function makeRecordingRunner() {
  const seen: ExecutionRequest[] = [];
  const layer = Layer.succeed(CommandRunner, {
    run: (request: ExecutionRequest) =>
      Effect.sync((): ExecutionResult => {
        seen.push(request);
        return {
          requestId: request.requestId,
          category: request.category,
          nodeId: request.nodeId,
          name: request.name,
          success: true,
          output: `ran ${request.name}`,
          exitCode: 0,
        };
      }),
  });
  return { seen, layer };
}

/**
 * Runner double that blocks every request until `release` completes,
 * signalling `started` when the first request is picked up
 */
export const makeGatedRunner = Effect.gen(function* () {
  const release = yield* Deferred.make<void>();
  const started = yield* Deferred.make<string>();
  const seen: string[] = [];
  const layer = Layer.succeed(CommandRunner, {
    run: (request: ExecutionRequest) =>
      Effect.gen(function* () {
        seen.push(request.nodeId);
        yield* Deferred.succeed(started, request.nodeId);
        yield* Deferred.await(release);
        const result: ExecutionResult = {
          requestId: request.requestId,
          category: request.category,
          nodeId: request.nodeId,
          name: request.name,
          success: true,
          output: "released",
        };
        return result;
      }),
  });
  return { release, started, seen, layer };
});

export function sessionLayer(
  provider: Layer.Layer<CatalogProvider>,
  runner: Layer.Layer<CommandRunner>,
  busyIndicator: BusyIndicatorMode = "pending",
) {
  return makeCatalogSessionLive({ validate: false }).pipe(
    Layer.provide(
      Layer.mergeAll(
        CatalogCacheLive,
        makeExecutionCoordinatorLive({ busyIndicator }),
      ),
    ),
    Layer.provide(Layer.mergeAll(provider, runner)),
  );
}
