/**
 * NavigationStack
 * Tracks the location inside one category tree and the path taken to get there.
 *
 * Also owns the cursor and search query of the current level, since both are
 * reset or restored by every push and pop.
 */

import type {
  CatalogCategory,
  CatalogNode,
  NodeId,
} from "@taskdeck/catalog-protocol";
import { clampSelection, filterItems } from "./search-filter.js";
import { type CatalogSnapshot, childrenOf, getNode } from "./snapshot.js";

export interface NavigationFrame {
  readonly nodeId: NodeId;
  /** Cursor of the level below this frame when it was pushed */
  readonly selectedIndex: number | undefined;
}

export class NavigationStack {
  // Never empty: the bottom frame is always the category root
  private frames: NavigationFrame[];
  private selected: number | undefined;
  private searchQuery = "";

  constructor(
    private readonly snapshot: CatalogSnapshot,
    readonly category: CatalogCategory,
  ) {
    this.frames = [{ nodeId: category.rootId, selectedIndex: 0 }];
    this.selected = clampSelection(0, this.visible().length);
  }

  get depth(): number {
    return this.frames.length;
  }

  get query(): string {
    return this.searchQuery;
  }

  get selectedIndex(): number | undefined {
    return this.selected;
  }

  get currentNodeId(): NodeId {
    return this.top().nodeId;
  }

  getFrames(): ReadonlyArray<NavigationFrame> {
    return this.frames;
  }

  atRoot(): boolean {
    return this.frames.length === 1;
  }

  /**
   * All children of the current level, ignoring the search query
   */
  children(): CatalogNode[] {
    const node = getNode(this.snapshot, this.currentNodeId);
    return node ? childrenOf(this.snapshot, node) : [];
  }

  /**
   * Children of the current level that match the search query
   */
  visible(): CatalogNode[] {
    return filterItems(this.children(), this.searchQuery);
  }

  selectedNode(): CatalogNode | undefined {
    return this.selected === undefined
      ? undefined
      : this.visible()[this.selected];
  }

  /**
   * Descend into a child of the current level.
   * No-op (false) unless the target is such a child and has children itself.
   */
  enter(nodeId: NodeId): boolean {
    const current = getNode(this.snapshot, this.currentNodeId);
    const target = getNode(this.snapshot, nodeId);
    if (!current || !target || !current.children.includes(nodeId)) {
      return false;
    }
    if (target.children.length === 0) {
      return false;
    }

    this.frames.push({ nodeId, selectedIndex: this.selected });
    this.searchQuery = "";
    this.selected = clampSelection(0, this.visible().length);
    return true;
  }

  /**
   * Pop one level and restore the cursor it had. No-op at the root.
   */
  goBack(): boolean {
    if (this.atRoot()) {
      return false;
    }

    const popped = this.frames.pop();
    this.searchQuery = "";
    this.selected = clampSelection(popped?.selectedIndex, this.visible().length);
    return true;
  }

  /**
   * Category name followed by the name of every entered node
   */
  breadcrumb(): string[] {
    return [
      this.category.name,
      ...this.frames
        .slice(1)
        .map((frame) => getNode(this.snapshot, frame.nodeId)?.name ?? frame.nodeId),
    ];
  }

  setQuery(query: string): void {
    this.searchQuery = query;
    this.selected = clampSelection(this.selected, this.visible().length);
  }

  /**
   * Move the cursor to an index of the visible items; ignored when out of range
   */
  select(index: number): boolean {
    const length = this.visible().length;
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      return false;
    }
    this.selected = index;
    return true;
  }

  /**
   * Move the cursor by `delta`, stopping at the first and last item
   */
  moveSelection(delta: number): number | undefined {
    const length = this.visible().length;
    if (length === 0) {
      this.selected = undefined;
      return undefined;
    }
    const from = this.selected ?? 0;
    this.selected = Math.min(length - 1, Math.max(0, from + delta));
    return this.selected;
  }

  private top(): NavigationFrame {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new Error("NavigationStack invariant violated: no frames");
    }
    return frame;
  }
}
