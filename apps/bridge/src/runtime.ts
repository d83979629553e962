/**
 * Bridge Runtime
 *
 * Unified Effect runtime for the bridge process: the catalog session with its
 * cache and execution coordinator, the config service and the file logger.
 */

import {
  CatalogCacheLive,
  CommandRunnerLive,
  makeCatalogSessionLive,
  makeExecutionCoordinatorLive,
} from "@taskdeck/catalog-core";
import { Layer, ManagedRuntime } from "effect";
import { type AppConfig, makeConfigServiceLive } from "./config.js";
import { createLoggerLayer } from "./logger.js";
import { makeJsonCatalogProviderLive } from "./providers/json-catalog-provider.js";

/**
 * Session layer wired from the effective config. The coordinator and cache
 * stay exposed so procedures can read execution status.
 */
export const makeSessionLayer = (config: AppConfig) =>
  makeCatalogSessionLive({ validate: !config.overrideValidation }).pipe(
    Layer.provideMerge(
      Layer.mergeAll(
        CatalogCacheLive,
        makeExecutionCoordinatorLive({ busyIndicator: config.busyIndicator }),
      ),
    ),
    Layer.provide(
      Layer.mergeAll(
        makeJsonCatalogProviderLive({ catalogPath: config.catalogPath }),
        CommandRunnerLive,
      ),
    ),
  );

export const makeBridgeLayer = (config: AppConfig, configPath: string) =>
  Layer.mergeAll(
    makeSessionLayer(config),
    makeConfigServiceLive(config, configPath),
    createLoggerLayer({ logFile: config.logFile, debug: config.debug }),
  );

/**
 * Managed runtime for the bridge; disposing it stops the execution worker
 */
export const makeBridgeRuntime = (config: AppConfig, configPath: string) =>
  ManagedRuntime.make(makeBridgeLayer(config, configPath));
