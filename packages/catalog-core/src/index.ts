/**
 * @taskdeck/catalog-core
 * Navigation, selection and serialized execution over an operation catalog
 */

export {
  CatalogCache,
  CatalogCacheLive,
} from "./catalog-cache.js";
export {
  type DocumentConversionOptions,
  snapshotFromDocument,
} from "./catalog-document.js";
export { CatalogProvider } from "./catalog-provider.js";
export {
  CatalogSession,
  type CatalogSessionOptions,
  makeCatalogSessionLive,
} from "./catalog-session.js";
export {
  CommandRunner,
  CommandRunnerLive,
  displayedOutput,
  NONINTERACTIVE_ENV,
} from "./command-runner.js";
export {
  CatalogLoadError,
  InvalidCatalogError,
  NonZeroExitError,
  NotExecutableError,
  NotFoundError,
  SpawnFailureError,
} from "./errors.js";
export {
  ExecutionCoordinator,
  ExecutionCoordinatorLive,
  type ExecutionCoordinatorOptions,
  makeExecutionCoordinatorLive,
} from "./execution-coordinator.js";
export {
  type NavigationFrame,
  NavigationStack,
} from "./navigation-stack.js";
export { renderPreview } from "./preview.js";
export {
  clampSelection,
  filterItems,
  type Searchable,
} from "./search-filter.js";
export { SelectionSet } from "./selection-set.js";
export {
  type CatalogSnapshot,
  childrenOf,
  findCategory,
  getNode,
  makeSnapshot,
} from "./snapshot.js";
export type { ExecutionRequest, RequestStatus } from "./types.js";
