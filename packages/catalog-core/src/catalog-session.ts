/**
 * CatalogSession
 * The contract offered to the interactive layer.
 *
 * Responsibilities:
 * - Loads the catalog through CatalogCache and keeps one active view
 *   (category, NavigationStack, SelectionSet) per session
 * - Derives visible items from navigation + search
 * - Turns execute calls into requests for the ExecutionCoordinator,
 *   rejecting unknown and non-executable nodes before dispatch
 *
 * Navigation and selection reset whenever the category switches or the
 * snapshot reloads. Operations on the view run one at a time, so the view is
 * created once and a refresh is never overtaken by a stale one.
 */

import { randomUUID } from "node:crypto";
import type {
  CatalogCategory,
  CatalogNode,
  ExecutionResult,
  ItemView,
  NodeId,
  ViewState,
} from "@taskdeck/catalog-protocol";
import { Context, Effect, Layer, Option, Ref } from "effect";
import { CatalogCache } from "./catalog-cache.js";
import {
  type CatalogLoadError,
  NotExecutableError,
  NotFoundError,
} from "./errors.js";
import { ExecutionCoordinator } from "./execution-coordinator.js";
import { NavigationStack } from "./navigation-stack.js";
import { renderPreview } from "./preview.js";
import { SelectionSet } from "./selection-set.js";
import { type CatalogSnapshot, findCategory, getNode } from "./snapshot.js";
import type { ExecutionRequest } from "./types.js";

export interface CatalogSessionOptions {
  /** Passed through to the catalog provider on every load */
  validate: boolean;
}

interface ActiveView {
  snapshot: CatalogSnapshot;
  navigation: NavigationStack;
  selection: SelectionSet;
}

type ViewError = CatalogLoadError | NotFoundError;

export class CatalogSession extends Context.Tag("CatalogSession")<
  CatalogSession,
  {
    readonly listCategories: Effect.Effect<string[], CatalogLoadError>;
    readonly view: Effect.Effect<ViewState, ViewError>;
    readonly currentItems: Effect.Effect<ItemView[], ViewError>;
    readonly enter: (nodeId: NodeId) => Effect.Effect<boolean, ViewError>;
    readonly goBack: Effect.Effect<boolean, ViewError>;
    readonly switchCategory: (name: string) => Effect.Effect<void, ViewError>;
    readonly setSearch: (text: string) => Effect.Effect<void, ViewError>;
    readonly select: (index: number) => Effect.Effect<boolean, ViewError>;
    readonly moveSelection: (
      delta: number,
    ) => Effect.Effect<number | undefined, ViewError>;
    /** Returns whether the node is selected afterwards */
    readonly toggleSelection: (
      nodeId: NodeId,
    ) => Effect.Effect<boolean, ViewError>;
    /** Returns the request id; never waits for the execution */
    readonly execute: (
      nodeId: NodeId,
    ) => Effect.Effect<string, ViewError | NotExecutableError>;
    readonly executeSelected: Effect.Effect<
      string[],
      ViewError | NotExecutableError
    >;
    readonly pollResult: Effect.Effect<ExecutionResult | undefined>;
    readonly awaitResult: Effect.Effect<ExecutionResult>;
    readonly preview: (nodeId: NodeId) => Effect.Effect<string, ViewError>;
    readonly refreshCatalog: Effect.Effect<string[], ViewError>;
    /** True while a submitted result is still unobserved */
    readonly needsTick: Effect.Effect<boolean>;
  }
>() {}

function toItemView(node: CatalogNode, selection: SelectionSet): ItemView {
  return {
    id: node.id,
    name: node.name,
    description: node.description,
    tags: [...node.tags],
    hasChildren: node.children.length > 0,
    isMultiSelected: selection.has(node.id),
    commandType: node.command.type,
  };
}

function firstCategory(
  snapshot: CatalogSnapshot,
): Effect.Effect<CatalogCategory, NotFoundError> {
  const category = snapshot.categories[0];
  return category
    ? Effect.succeed(category)
    : Effect.fail(
        new NotFoundError({
          message: "Catalog has no categories",
          kind: "category",
          key: "",
        }),
      );
}

function lookupNode(
  snapshot: CatalogSnapshot,
  nodeId: NodeId,
): Effect.Effect<CatalogNode, NotFoundError> {
  const node = getNode(snapshot, nodeId);
  return node
    ? Effect.succeed(node)
    : Effect.fail(
        new NotFoundError({
          message: `Node not found: ${nodeId}`,
          kind: "node",
          key: nodeId,
        }),
      );
}

const makeCatalogSession = (options: CatalogSessionOptions) =>
  Effect.gen(function* () {
    const cache = yield* CatalogCache;
    const coordinator = yield* ExecutionCoordinator;
    const viewRef = yield* Ref.make(Option.none<ActiveView>());
    const viewLock = yield* Effect.makeSemaphore(1);
    const serialized = viewLock.withPermits(1);

    const openView = (
      snapshot: CatalogSnapshot,
      category: CatalogCategory,
    ): ActiveView => ({
      snapshot,
      navigation: new NavigationStack(snapshot, category),
      selection: new SelectionSet(),
    });

    const activeView = Effect.gen(function* () {
      const current = yield* Ref.get(viewRef);
      if (Option.isSome(current)) {
        return current.value;
      }

      const snapshot = yield* cache.load(options.validate);
      const category = yield* firstCategory(snapshot);
      const view = openView(snapshot, category);
      yield* Ref.set(viewRef, Option.some(view));
      return view;
    });

    /**
     * Resolve a node to a request, failing for grouping nodes
     */
    const toRequest = (
      view: ActiveView,
      node: CatalogNode,
    ): Effect.Effect<ExecutionRequest, NotExecutableError> => {
      const command = node.command;
      if (command.type === "none") {
        return Effect.fail(
          new NotExecutableError({
            message: `Cannot execute directory: ${node.name}`,
            nodeId: node.id,
          }),
        );
      }
      return Effect.succeed({
        requestId: randomUUID(),
        category: view.navigation.category.name,
        nodeId: node.id,
        name: node.name,
        command,
      });
    };

    const listCategories = cache
      .load(options.validate)
      .pipe(Effect.map((snapshot) => snapshot.categories.map((c) => c.name)));

    const currentItems = activeView.pipe(
      Effect.map((view) =>
        view.navigation
          .visible()
          .map((node) => toItemView(node, view.selection)),
      ),
    );

    const view = Effect.gen(function* () {
      const active = yield* activeView;
      const executing = yield* coordinator.isExecuting;
      const { navigation, selection } = active;
      const state: ViewState = {
        category: navigation.category.name,
        breadcrumb: navigation.breadcrumb(),
        atRoot: navigation.atRoot(),
        query: navigation.query,
        selectedIndex: navigation.selectedIndex,
        items: navigation.visible().map((node) => toItemView(node, selection)),
        selectionCount: selection.size,
        executing,
      };
      return state;
    });

    const enter = (nodeId: NodeId) =>
      Effect.gen(function* () {
        const active = yield* activeView;
        yield* lookupNode(active.snapshot, nodeId);
        const entered = active.navigation.enter(nodeId);
        yield* Effect.logDebug(
          `[CatalogSession] enter ${nodeId}: ${entered ? "pushed" : "no-op"}`,
        );
        return entered;
      });

    const goBack = activeView.pipe(
      Effect.map((active) => active.navigation.goBack()),
    );

    const switchCategory = (name: string) =>
      Effect.gen(function* () {
        const snapshot = yield* cache.load(options.validate);
        const category = findCategory(snapshot, name);
        if (!category) {
          return yield* Effect.fail(
            new NotFoundError({
              message: `Category not found: ${name}`,
              kind: "category",
              key: name,
            }),
          );
        }
        yield* Ref.set(viewRef, Option.some(openView(snapshot, category)));
        yield* Effect.logDebug(`[CatalogSession] Switched to ${name}`);
      });

    const setSearch = (text: string) =>
      activeView.pipe(
        Effect.map((active) => active.navigation.setQuery(text)),
      );

    const select = (index: number) =>
      activeView.pipe(Effect.map((active) => active.navigation.select(index)));

    const moveSelection = (delta: number) =>
      activeView.pipe(
        Effect.map((active) => active.navigation.moveSelection(delta)),
      );

    const toggleSelection = (nodeId: NodeId) =>
      Effect.gen(function* () {
        const active = yield* activeView;
        const node = yield* lookupNode(active.snapshot, nodeId);
        return active.selection.toggle(node);
      });

    const execute = (nodeId: NodeId) =>
      Effect.gen(function* () {
        const active = yield* activeView;
        const node = yield* lookupNode(active.snapshot, nodeId);
        const request = yield* toRequest(active, node);
        yield* coordinator.submit(request);
        yield* Effect.logInfo(
          `[CatalogSession] Submitted ${node.name} (${request.requestId})`,
        );
        return request.requestId;
      });

    // All members are validated before anything is submitted
    const executeSelected = Effect.gen(function* () {
      const active = yield* activeView;
      const requests = yield* Effect.forEach(
        active.selection.members(),
        (nodeId) =>
          lookupNode(active.snapshot, nodeId).pipe(
            Effect.flatMap((node) => toRequest(active, node)),
          ),
      );

      yield* Effect.forEach(requests, (request) => coordinator.submit(request), {
        discard: true,
      });
      active.selection.clear();
      yield* Effect.logInfo(
        `[CatalogSession] Submitted batch of ${requests.length} requests`,
      );
      return requests.map((request) => request.requestId);
    });

    const preview = (nodeId: NodeId) =>
      Effect.gen(function* () {
        const active = yield* activeView;
        const node = yield* lookupNode(active.snapshot, nodeId);
        return yield* renderPreview(node);
      });

    const refreshCatalog = Effect.gen(function* () {
      const previous = yield* Ref.get(viewRef);
      yield* cache.invalidate;
      const snapshot = yield* cache.load(options.validate);

      const previousName = Option.map(
        previous,
        (active) => active.navigation.category.name,
      ).pipe(Option.getOrUndefined);
      const category =
        (previousName !== undefined
          ? findCategory(snapshot, previousName)
          : undefined) ?? (yield* firstCategory(snapshot));

      yield* Ref.set(viewRef, Option.some(openView(snapshot, category)));
      yield* Effect.logInfo("[CatalogSession] Catalog refreshed");
      return snapshot.categories.map((c) => c.name);
    });

    return {
      listCategories,
      view: serialized(view),
      currentItems: serialized(currentItems),
      enter: (nodeId: NodeId) => serialized(enter(nodeId)),
      goBack: serialized(goBack),
      switchCategory: (name: string) => serialized(switchCategory(name)),
      setSearch: (text: string) => serialized(setSearch(text)),
      select: (index: number) => serialized(select(index)),
      moveSelection: (delta: number) => serialized(moveSelection(delta)),
      toggleSelection: (nodeId: NodeId) => serialized(toggleSelection(nodeId)),
      execute: (nodeId: NodeId) => serialized(execute(nodeId)),
      executeSelected: serialized(executeSelected),
      pollResult: coordinator.poll,
      awaitResult: coordinator.take,
      preview: (nodeId: NodeId) => serialized(preview(nodeId)),
      refreshCatalog: serialized(refreshCatalog),
      needsTick: coordinator.pending.pipe(Effect.map((pending) => pending > 0)),
    };
  });

/**
 * Live layer for a session; needs CatalogCache and ExecutionCoordinator
 */
export const makeCatalogSessionLive = (options: CatalogSessionOptions) =>
  Layer.effect(CatalogSession, makeCatalogSession(options));
