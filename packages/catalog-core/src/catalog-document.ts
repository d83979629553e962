/**
 * Converts an authored catalog document into a snapshot arena.
 *
 * Ids default to the entry's index path inside its category ("0" for the
 * first category's root, "0.2.1" below it), so they stay stable across
 * reloads of the same document even when a filter drops siblings.
 */

import * as path from "node:path";
import type {
  CatalogCategory,
  CatalogDocument,
  CatalogEntry,
  CatalogNode,
  CommandSpec,
  NodeId,
} from "@taskdeck/catalog-protocol";
import type { Either } from "effect";
import type { InvalidCatalogError } from "./errors.js";
import { type CatalogSnapshot, makeSnapshot } from "./snapshot.js";

export interface DocumentConversionOptions {
  /** Directory script paths are resolved against */
  baseDir: string;
  /** Entries rejected here are dropped with their subtree */
  include?: (entry: CatalogEntry) => boolean;
}

function commandFor(entry: CatalogEntry, baseDir: string): CommandSpec {
  if (entry.command !== undefined) {
    return { type: "raw", command: entry.command };
  }
  if (entry.script !== undefined) {
    const file = path.resolve(baseDir, entry.script.file);
    return {
      type: "local-file",
      executable: entry.script.executable,
      args: entry.script.args ?? [file],
      file,
    };
  }
  return { type: "none" };
}

export function snapshotFromDocument(
  document: CatalogDocument,
  options: DocumentConversionOptions,
): Either.Either<CatalogSnapshot, InvalidCatalogError> {
  const nodes: CatalogNode[] = [];
  const categories: CatalogCategory[] = [];

  const convertEntries = (
    entries: CatalogEntry[],
    parentPath: string,
  ): NodeId[] => {
    const ids: NodeId[] = [];

    entries.forEach((entry, index) => {
      if (options.include && !options.include(entry)) return;

      const pathId = `${parentPath}.${index}`;
      const children = entry.entries
        ? convertEntries(entry.entries, pathId)
        : [];

      // A directory emptied by the filter has nothing left to offer
      if (entry.entries && entry.entries.length > 0 && children.length === 0) {
        return;
      }

      const id = entry.id ?? pathId;
      nodes.push({
        id,
        name: entry.name,
        description: entry.description,
        tags: entry.taskList,
        multiSelect: entry.multiSelect,
        children,
        command: commandFor(entry, options.baseDir),
      });
      ids.push(id);
    });

    return ids;
  };

  document.categories.forEach((category, index) => {
    const rootId = String(index);
    const children = convertEntries(category.entries, rootId);
    nodes.push({
      id: rootId,
      name: category.name,
      description: "",
      tags: [],
      multiSelect: false,
      children,
      command: { type: "none" },
    });
    categories.push({ name: category.name, rootId });
  });

  return makeSnapshot(categories, nodes);
}
