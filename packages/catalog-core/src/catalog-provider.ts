import { Context, type Effect } from "effect";
import type { CatalogLoadError } from "./errors.js";
import type { CatalogSnapshot } from "./snapshot.js";

/**
 * Source of catalog snapshots.
 *
 * `validate = false` asks for every node; `validate = true` lets the provider
 * apply its own compatibility filter. The core passes the flag through
 * without interpreting it.
 */
export class CatalogProvider extends Context.Tag("CatalogProvider")<
  CatalogProvider,
  {
    readonly getCatalog: (
      validate: boolean,
    ) => Effect.Effect<CatalogSnapshot, CatalogLoadError>;
  }
>() {}
