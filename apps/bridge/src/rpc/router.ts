import { Effect, Schedule } from "effect";
import { z } from "zod";
import { AppConfigPatchSchema } from "../config.js";
import type { RpcContext } from "./context.js";
import { createRouter } from "./procedure.js";

const { router, procedure } = createRouter<RpcContext>();

const NodeInput = z.object({ nodeId: z.string().min(1) });

const IDLE_CHECK_INTERVAL = "25 millis";

/**
 * Bridge RPC Router
 *
 * Defines procedures for:
 * - Catalog (categories, refresh)
 * - Navigation (view, items, enter, back, category, search, cursor)
 * - Selection and execution
 * - Preview, config and host info
 */
export const bridgeRouter = router({
  catalog: {
    categories: procedure
      .input(z.void())
      .query(({ ctx }) => ctx.session.listCategories),

    /**
     * Reload the catalog document and reset the view
     */
    refresh: procedure
      .input(z.void())
      .mutation(({ ctx }) =>
        ctx.session.refreshCatalog.pipe(
          Effect.map((categories) => ({ categories })),
        ),
      ),
  },

  navigation: {
    view: procedure.input(z.void()).query(({ ctx }) => ctx.session.view),

    items: procedure
      .input(z.void())
      .query(({ ctx }) => ctx.session.currentItems),

    enter: procedure
      .input(NodeInput)
      .mutation(({ input, ctx }) =>
        ctx.session
          .enter(input.nodeId)
          .pipe(Effect.map((entered) => ({ entered }))),
      ),

    back: procedure
      .input(z.void())
      .mutation(({ ctx }) =>
        ctx.session.goBack.pipe(Effect.map((moved) => ({ moved }))),
      ),

    switchCategory: procedure
      .input(z.object({ name: z.string().min(1) }))
      .mutation(({ input, ctx }) =>
        ctx.session
          .switchCategory(input.name)
          .pipe(Effect.zipRight(ctx.session.view)),
      ),

    search: procedure
      .input(z.object({ text: z.string() }))
      .mutation(({ input, ctx }) =>
        ctx.session
          .setSearch(input.text)
          .pipe(Effect.zipRight(ctx.session.currentItems)),
      ),

    select: procedure
      .input(z.object({ index: z.number().int() }))
      .mutation(({ input, ctx }) =>
        ctx.session
          .select(input.index)
          .pipe(Effect.map((selected) => ({ selected }))),
      ),

    move: procedure
      .input(z.object({ delta: z.number().int() }))
      .mutation(({ input, ctx }) =>
        ctx.session
          .moveSelection(input.delta)
          .pipe(
            Effect.map((selectedIndex) => ({
              selectedIndex: selectedIndex ?? null,
            })),
          ),
      ),
  },

  selection: {
    toggle: procedure
      .input(NodeInput)
      .mutation(({ input, ctx }) =>
        ctx.session
          .toggleSelection(input.nodeId)
          .pipe(Effect.map((selected) => ({ selected }))),
      ),
  },

  execution: {
    /**
     * Queue one node; returns as soon as it is queued
     */
    run: procedure
      .input(NodeInput)
      .mutation(({ input, ctx }) =>
        ctx.session
          .execute(input.nodeId)
          .pipe(Effect.map((requestId) => ({ requestId }))),
      ),

    runSelected: procedure
      .input(z.void())
      .mutation(({ ctx }) =>
        ctx.session.executeSelected.pipe(
          Effect.map((requestIds) => ({ requestIds })),
        ),
      ),

    poll: procedure.input(z.void()).query(({ ctx }) =>
      Effect.gen(function* () {
        const result = yield* ctx.session.pollResult;
        const executing = yield* ctx.coordinator.isExecuting;
        const needsTick = yield* ctx.session.needsTick;
        return { result: result ?? null, executing, needsTick };
      }),
    ),

    /**
     * Wait for the next result; null once nothing is pending, including when
     * another caller took the last result while this one waited
     */
    await: procedure.input(z.void()).query(({ ctx }) =>
      Effect.gen(function* () {
        const ready = yield* ctx.session.pollResult;
        if (ready !== undefined) {
          return ready;
        }

        const idle = ctx.coordinator.pending.pipe(
          Effect.repeat({
            until: (pending) => pending === 0,
            schedule: Schedule.spaced(IDLE_CHECK_INTERVAL),
          }),
          Effect.as(null),
        );
        return yield* Effect.race(ctx.session.awaitResult, idle);
      }),
    ),

    status: procedure
      .input(z.object({ requestId: z.string().min(1) }))
      .query(({ input, ctx }) =>
        Effect.gen(function* () {
          const status = yield* ctx.coordinator.statusOf(input.requestId);
          const pending = yield* ctx.coordinator.pending;
          const executing = yield* ctx.coordinator.isExecuting;
          return { status: status ?? null, pending, executing };
        }),
      ),
  },

  preview: {
    get: procedure
      .input(NodeInput)
      .query(({ input, ctx }) =>
        ctx.session
          .preview(input.nodeId)
          .pipe(Effect.map((text) => ({ text }))),
      ),
  },

  config: {
    get: procedure.input(z.void()).query(({ ctx }) => ctx.config.get),

    /**
     * Merge and persist a partial config. Catalog, validation and busy
     * indicator changes apply from the next start.
     */
    update: procedure
      .input(AppConfigPatchSchema.strict())
      .mutation(({ input, ctx }) => ctx.config.update(input)),
  },

  system: {
    info: procedure.input(z.void()).query(({ ctx }) => ctx.systemInfo),
  },
});

export type BridgeRouter = typeof bridgeRouter;
