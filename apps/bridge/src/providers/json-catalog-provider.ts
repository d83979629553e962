/**
 * JSON Catalog Provider
 * Reads a catalog document from disk on every call; CatalogCache decides
 * how often that happens.
 *
 * With `validate = true` entries whose preconditions fail on this host are
 * dropped together with their subtree.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  CatalogLoadError,
  CatalogProvider,
  snapshotFromDocument,
} from "@taskdeck/catalog-core";
import { CatalogDocumentSchema } from "@taskdeck/catalog-protocol";
import { Effect, Either, Layer } from "effect";
import { meetsPreconditions, type PreconditionEnvironment } from "./preconditions.js";

export interface JsonCatalogProviderOptions {
  catalogPath: string;
  environment?: PreconditionEnvironment;
}

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const loadCatalogDocument = (catalogPath: string) =>
  Effect.gen(function* () {
    const content = yield* Effect.tryPromise({
      try: () => fs.readFile(catalogPath, "utf-8"),
      catch: (error) =>
        new CatalogLoadError({
          message: `Failed to read catalog ${catalogPath}: ${errorMessage(error)}`,
          cause: error,
        }),
    });

    const raw = yield* Effect.try({
      try: (): unknown => JSON.parse(content),
      catch: (error) =>
        new CatalogLoadError({
          message: `Catalog ${catalogPath} is not valid JSON: ${errorMessage(error)}`,
          cause: error,
        }),
    });

    const parsed = CatalogDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      return yield* Effect.fail(
        new CatalogLoadError({
          message: `Invalid catalog document ${catalogPath}: ${parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ")}`,
          cause: parsed.error,
        }),
      );
    }
    return parsed.data;
  });

export const makeJsonCatalogProviderLive = (
  options: JsonCatalogProviderOptions,
) =>
  Layer.succeed(CatalogProvider, {
    getCatalog: (validate: boolean) =>
      Effect.gen(function* () {
        yield* Effect.logDebug(
          `[JsonCatalogProvider] Loading ${options.catalogPath} (validate=${validate})`,
        );
        const document = yield* loadCatalogDocument(options.catalogPath);

        const include = validate
          ? meetsPreconditions(options.environment ?? { env: process.env })
          : undefined;
        const snapshot = snapshotFromDocument(document, {
          baseDir: path.dirname(options.catalogPath),
          include,
        });

        if (Either.isLeft(snapshot)) {
          return yield* Effect.fail(
            new CatalogLoadError({
              message: `Invalid catalog ${options.catalogPath}: ${snapshot.left.message}`,
              cause: snapshot.left,
            }),
          );
        }

        yield* Effect.logInfo(
          `[JsonCatalogProvider] Loaded ${snapshot.right.categories.length} categories, ${snapshot.right.nodes.size} nodes`,
        );
        return snapshot.right;
      }),
  });
