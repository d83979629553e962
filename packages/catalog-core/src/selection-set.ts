/**
 * SelectionSet
 * Node ids marked for batched execution, in the order they were marked.
 * Keyed by id so membership survives navigation.
 */

import type { CatalogNode, NodeId } from "@taskdeck/catalog-protocol";

export class SelectionSet {
  private readonly ids = new Set<NodeId>();

  /**
   * Flip membership of a multi-select node.
   * Returns whether the node is selected afterwards.
   */
  toggle(node: CatalogNode): boolean {
    if (!node.multiSelect) {
      return false;
    }

    if (this.ids.has(node.id)) {
      this.ids.delete(node.id);
      return false;
    }
    this.ids.add(node.id);
    return true;
  }

  has(id: NodeId): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  members(): NodeId[] {
    return [...this.ids];
  }

  clear(): void {
    this.ids.clear();
  }
}
