import { CatalogSession, ExecutionCoordinator } from "@taskdeck/catalog-core";
import type { SystemInfo } from "@taskdeck/catalog-protocol";
import { type Context, Effect } from "effect";
import { ConfigService } from "../config.js";
import { getSystemInfo } from "../system-info.js";

/**
 * RPC Context - the services router procedures run against
 */
export interface RpcContext {
  readonly session: Context.Tag.Service<CatalogSession>;
  readonly coordinator: Context.Tag.Service<ExecutionCoordinator>;
  readonly config: Context.Tag.Service<ConfigService>;
  readonly systemInfo: Effect.Effect<SystemInfo>;
}

export const makeRpcContext = Effect.gen(function* () {
  const context: RpcContext = {
    session: yield* CatalogSession,
    coordinator: yield* ExecutionCoordinator,
    config: yield* ConfigService,
    systemInfo: getSystemInfo,
  };
  return context;
});
