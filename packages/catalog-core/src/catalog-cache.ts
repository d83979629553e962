/**
 * Catalog Cache
 * Single-slot memo of the most recently loaded snapshot.
 *
 * The slot holds a Deferred, so overlapping loads share one provider call.
 * The slot is claimed atomically and the provider runs outside of that.
 * A failed or interrupted load empties the slot again. Invalidation is
 * explicit and whole-snapshot only.
 */

import { Context, Deferred, Effect, Exit, Layer, Option, Ref } from "effect";
import { CatalogProvider } from "./catalog-provider.js";
import type { CatalogLoadError } from "./errors.js";
import type { CatalogSnapshot } from "./snapshot.js";

type PendingSnapshot = Deferred.Deferred<CatalogSnapshot, CatalogLoadError>;

export class CatalogCache extends Context.Tag("CatalogCache")<
  CatalogCache,
  {
    /** Cached snapshot, or exactly one provider call when the slot is empty */
    readonly load: (
      validate: boolean,
    ) => Effect.Effect<CatalogSnapshot, CatalogLoadError>;
    readonly invalidate: Effect.Effect<void>;
    /** Current slot content without loading; undefined while a load runs */
    readonly peek: Effect.Effect<CatalogSnapshot | undefined>;
  }
>() {}

const makeCatalogCache = Effect.gen(function* () {
  const provider = yield* CatalogProvider;
  const slot = yield* Ref.make(Option.none<PendingSnapshot>());

  const release = (pending: PendingSnapshot) =>
    Ref.update(slot, (current) =>
      Option.isSome(current) && current.value === pending
        ? Option.none()
        : current,
    );

  const fill = (validate: boolean) =>
    Effect.logDebug(
      `[CatalogCache] Slot empty, loading catalog (validate=${validate})`,
    ).pipe(
      Effect.zipRight(provider.getCatalog(validate)),
      Effect.tap((snapshot) =>
        Effect.logDebug(
          `[CatalogCache] Stored snapshot with ${snapshot.categories.length} categories`,
        ),
      ),
    );

  // Claiming the slot and settling its Deferred cannot be interrupted apart
  const load = (validate: boolean) =>
    Effect.uninterruptibleMask((restore) =>
      Effect.gen(function* () {
        const fresh = yield* Deferred.make<CatalogSnapshot, CatalogLoadError>();
        const [pending, owner] = yield* Ref.modify(
          slot,
          (
            current,
          ): [[PendingSnapshot, boolean], Option.Option<PendingSnapshot>] =>
            Option.isSome(current)
              ? [[current.value, false], current]
              : [[fresh, true], Option.some(fresh)],
        );

        if (!owner) {
          return yield* restore(Deferred.await(pending));
        }

        return yield* restore(fill(validate)).pipe(
          Effect.onExit((exit) =>
            Effect.zipRight(
              Exit.isSuccess(exit) ? Effect.void : release(pending),
              Deferred.done(pending, exit),
            ),
          ),
        );
      }),
    );

  const invalidate = Ref.set(slot, Option.none<PendingSnapshot>()).pipe(
    Effect.zipRight(Effect.logDebug("[CatalogCache] Invalidated")),
  );

  const peek = Effect.gen(function* () {
    const current = yield* Ref.get(slot);
    if (Option.isNone(current)) {
      return undefined;
    }
    const done = yield* Deferred.poll(current.value);
    if (Option.isNone(done)) {
      return undefined;
    }
    const exit = yield* Effect.exit(done.value);
    return Exit.isSuccess(exit) ? exit.value : undefined;
  });

  return { load, invalidate, peek };
});

/**
 * Live layer for the catalog cache; needs a CatalogProvider
 */
export const CatalogCacheLive = Layer.effect(CatalogCache, makeCatalogCache);
