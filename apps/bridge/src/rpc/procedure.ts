import type { RpcProcedureType } from "@taskdeck/catalog-protocol";
import { Data, Effect } from "effect";
import type { z } from "zod";

/**
 * Request input rejected by a procedure's schema
 */
export class InvalidInputError extends Data.TaggedError("InvalidInput")<{
  message: string;
}> {}

export interface ProcedureDef<TContext, TType extends RpcProcedureType> {
  readonly type: TType;
  readonly input: z.ZodTypeAny;
  /** Validates the raw input, then runs the handler */
  readonly call: (
    input: unknown,
    ctx: TContext,
  ) => Effect.Effect<unknown, unknown>;
}

export interface Procedure<
  TContext,
  TType extends RpcProcedureType = RpcProcedureType,
> {
  readonly _def: ProcedureDef<TContext, TType>;
}

export type RouterRecord<TContext> = {
  readonly [key: string]: RouterRecord<TContext> | Procedure<TContext>;
};

type Handler<TContext, TInput, TOutput> = (opts: {
  input: TInput;
  ctx: TContext;
}) => Effect.Effect<TOutput, unknown>;

export interface ProcedureBuilderWithInput<TContext, TInput> {
  query: <TOutput>(
    handler: Handler<TContext, TInput, TOutput>,
  ) => Procedure<TContext, "query">;
  mutation: <TOutput>(
    handler: Handler<TContext, TInput, TOutput>,
  ) => Procedure<TContext, "mutation">;
}

export interface ProcedureBuilder<TContext> {
  input: <TSchema extends z.ZodTypeAny>(
    schema: TSchema,
  ) => ProcedureBuilderWithInput<TContext, z.output<TSchema>>;
}

function defineProcedure<
  TContext,
  TSchema extends z.ZodTypeAny,
  TType extends RpcProcedureType,
  TOutput,
>(
  type: TType,
  schema: TSchema,
  handler: Handler<TContext, z.output<TSchema>, TOutput>,
): Procedure<TContext, TType> {
  return {
    _def: {
      type,
      input: schema,
      call: (input, ctx) => {
        const parsed = schema.safeParse(input);
        if (!parsed.success) {
          return Effect.fail(
            new InvalidInputError({
              message: `Invalid input: ${parsed.error.message}`,
            }),
          );
        }
        return handler({ input: parsed.data, ctx });
      },
    },
  };
}

export function createProcedureBuilder<TContext>(): ProcedureBuilder<TContext> {
  return {
    input: <TSchema extends z.ZodTypeAny>(schema: TSchema) => ({
      query: <TOutput>(
        handler: Handler<TContext, z.output<TSchema>, TOutput>,
      ) => defineProcedure("query", schema, handler),
      mutation: <TOutput>(
        handler: Handler<TContext, z.output<TSchema>, TOutput>,
      ) => defineProcedure("mutation", schema, handler),
    }),
  };
}

/**
 * Create a router with type-safe procedures
 */
export function createRouter<TContext>() {
  return {
    router: <T extends RouterRecord<TContext>>(routes: T): T => routes,
    procedure: createProcedureBuilder<TContext>(),
  };
}

function isProcedure<TContext>(
  value: RouterRecord<TContext> | Procedure<TContext>,
): value is Procedure<TContext> {
  return "_def" in value;
}

/**
 * Navigate to a procedure by path
 */
export function getProcedure<TContext>(
  router: RouterRecord<TContext>,
  path: ReadonlyArray<string>,
): Procedure<TContext> | undefined {
  let current: RouterRecord<TContext> | Procedure<TContext> = router;

  for (const segment of path) {
    if (isProcedure(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    const next: RouterRecord<TContext> | Procedure<TContext> | undefined =
      current[segment];
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }

  return isProcedure(current) ? current : undefined;
}
