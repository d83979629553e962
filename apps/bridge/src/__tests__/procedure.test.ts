import { describe, it } from "@effect/vitest";
import { Effect } from "effect";
import { expect } from "vitest";
import { z } from "zod";
import { createRouter, getProcedure } from "../rpc/procedure.js";

interface TestContext {
  greeting: string;
}

const { router, procedure } = createRouter<TestContext>();

const testRouter = router({
  greet: {
    hello: procedure
      .input(z.object({ name: z.string().min(1) }))
      .query(({ input, ctx }) =>
        Effect.succeed(`${ctx.greeting}, ${input.name}`),
      ),
  },
  ping: procedure.input(z.void()).mutation(() => Effect.succeed("pong")),
});

describe("procedure", () => {
  describe("getProcedure", () => {
    it("finds nested procedures", () => {
      expect(getProcedure(testRouter, ["greet", "hello"])?._def.type).toBe(
        "query",
      );
      expect(getProcedure(testRouter, ["ping"])?._def.type).toBe("mutation");
    });

    it("returns undefined for routers, unknown paths and inherited keys", () => {
      expect(getProcedure(testRouter, ["greet"])).toBeUndefined();
      expect(getProcedure(testRouter, ["greet", "bye"])).toBeUndefined();
      expect(getProcedure(testRouter, ["ping", "deeper"])).toBeUndefined();
      expect(getProcedure(testRouter, ["toString"])).toBeUndefined();
    });
  });

  describe("call", () => {
    it.effect("validates input before running the handler", () =>
      Effect.gen(function* () {
        const hello = getProcedure(testRouter, ["greet", "hello"]);
        expect(hello).toBeDefined();
        if (!hello) return;

        const ctx = { greeting: "Hi" };
        expect(yield* hello._def.call({ name: "Ada" }, ctx)).toBe("Hi, Ada");

        const error = yield* Effect.flip(hello._def.call({ name: "" }, ctx));
        expect(error).toMatchObject({ _tag: "InvalidInput" });
      }),
    );

    it.effect("accepts a missing input for void procedures", () =>
      Effect.gen(function* () {
        expect(yield* testRouter.ping._def.call(undefined, { greeting: "" })).toBe(
          "pong",
        );
      }),
    );
  });
});
