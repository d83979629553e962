/**
 * Catalog snapshot
 * Immutable arena of catalog nodes keyed by id, one root per category.
 * Trees only hold child-id lists, so a node is never copied per level.
 */

import type {
  CatalogCategory,
  CatalogNode,
  NodeId,
} from "@taskdeck/catalog-protocol";
import { Either } from "effect";
import { InvalidCatalogError } from "./errors.js";

export interface CatalogSnapshot {
  readonly categories: ReadonlyArray<CatalogCategory>;
  readonly nodes: ReadonlyMap<NodeId, CatalogNode>;
}

/**
 * Build a snapshot, checking that ids are unique and every reference resolves
 */
export function makeSnapshot(
  categories: ReadonlyArray<CatalogCategory>,
  nodes: Iterable<CatalogNode>,
): Either.Either<CatalogSnapshot, InvalidCatalogError> {
  const arena = new Map<NodeId, CatalogNode>();

  for (const node of nodes) {
    if (arena.has(node.id)) {
      return Either.left(
        new InvalidCatalogError({ message: `Duplicate node id: ${node.id}` }),
      );
    }
    arena.set(
      node.id,
      Object.freeze({
        ...node,
        tags: Object.freeze([...node.tags]),
        children: Object.freeze([...node.children]),
      }),
    );
  }

  for (const node of arena.values()) {
    const missing = node.children.find((childId) => !arena.has(childId));
    if (missing !== undefined) {
      return Either.left(
        new InvalidCatalogError({
          message: `Node ${node.id} references unknown child ${missing}`,
        }),
      );
    }
  }

  const seenNames = new Set<string>();
  for (const category of categories) {
    if (seenNames.has(category.name)) {
      return Either.left(
        new InvalidCatalogError({
          message: `Duplicate category name: ${category.name}`,
        }),
      );
    }
    seenNames.add(category.name);

    if (!arena.has(category.rootId)) {
      return Either.left(
        new InvalidCatalogError({
          message: `Category ${category.name} has unknown root ${category.rootId}`,
        }),
      );
    }
  }

  return Either.right(
    Object.freeze({
      categories: Object.freeze(categories.map((c) => Object.freeze({ ...c }))),
      nodes: arena,
    }),
  );
}

export function getNode(
  snapshot: CatalogSnapshot,
  id: NodeId,
): CatalogNode | undefined {
  return snapshot.nodes.get(id);
}

export function findCategory(
  snapshot: CatalogSnapshot,
  name: string,
): CatalogCategory | undefined {
  return snapshot.categories.find((category) => category.name === name);
}

/**
 * Resolve a node's children in order
 */
export function childrenOf(
  snapshot: CatalogSnapshot,
  node: CatalogNode,
): CatalogNode[] {
  const children: CatalogNode[] = [];
  for (const childId of node.children) {
    const child = snapshot.nodes.get(childId);
    if (child) children.push(child);
  }
  return children;
}
