/**
 * Bridge RPC Server
 *
 * Handles RPC requests from a front-end over NDJSON: one request per input
 * line, one response per output line. Requests run concurrently, so
 * responses may arrive out of order and are matched by id.
 */

import * as readline from "node:readline";
import {
  type RpcErrorCode,
  type RpcResponse,
  RpcRequestSchema,
} from "@taskdeck/catalog-protocol";
import { Effect, Fiber, Runtime } from "effect";
import { getProcedure, type RouterRecord } from "./procedure.js";

const UNKNOWN_ID = "unknown";

// Tagged errors whose tag is reported to the client as the error code
const DOMAIN_ERROR_CODES: ReadonlyArray<RpcErrorCode> = [
  "NotFound",
  "NotExecutable",
  "InvalidInput",
  "CatalogLoadError",
];

function errorTag(error: unknown): string | undefined {
  return typeof error === "object" &&
    error !== null &&
    "_tag" in error &&
    typeof error._tag === "string"
    ? error._tag
    : undefined;
}

function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

export function errorResponse(
  id: string,
  code: RpcErrorCode,
  message: string,
): RpcResponse {
  return { id, success: false, error: { message, code } };
}

/**
 * Map a failure to the error code sent to the client
 */
export function toErrorResponse(id: string, error: unknown): RpcResponse {
  const tag = errorTag(error);
  const code = DOMAIN_ERROR_CODES.find((known) => known === tag);
  return errorResponse(id, code ?? "InternalError", errorMessageOf(error));
}

function readId(value: unknown): string {
  return typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    value.id.length > 0
    ? value.id
    : UNKNOWN_ID;
}

/**
 * Handle one input line. Blank lines produce no response; every other line
 * produces exactly one, whatever happens while handling it.
 */
export const handleLine = <TContext>(
  line: string,
  router: RouterRecord<TContext>,
  ctx: TContext,
): Effect.Effect<RpcResponse | undefined> => {
  if (line.trim().length === 0) {
    return Effect.succeed(undefined);
  }

  let message: unknown;
  try {
    message = JSON.parse(line);
  } catch (error) {
    const reason = errorMessageOf(error);
    return Effect.logWarning(
      `[RpcServer] Failed to parse message: ${reason}`,
    ).pipe(
      Effect.as(
        errorResponse(UNKNOWN_ID, "InvalidInput", `Invalid JSON: ${reason}`),
      ),
    );
  }

  const parsed = RpcRequestSchema.safeParse(message);
  if (!parsed.success) {
    return Effect.succeed(
      errorResponse(
        readId(message),
        "InvalidInput",
        `Invalid request: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
      ),
    );
  }

  const { id, type, path, input } = parsed.data;
  const procedure = getProcedure(router, path);
  if (!procedure) {
    return Effect.succeed(
      errorResponse(
        id,
        "ProcedureNotFound",
        `Procedure not found: ${path.join(".")}`,
      ),
    );
  }

  if (procedure._def.type !== type) {
    return Effect.succeed(
      errorResponse(
        id,
        "InvalidInput",
        `Invalid procedure type: expected ${procedure._def.type}, got ${type}`,
      ),
    );
  }

  return Effect.suspend(() => procedure._def.call(input, ctx)).pipe(
    Effect.map((data): RpcResponse => ({ id, success: true, data })),
    Effect.catchAll((error) =>
      Effect.logDebug(
        `[RpcServer] ${path.join(".")} failed: ${errorMessageOf(error)}`,
      ).pipe(
        Effect.as(toErrorResponse(id, error)),
      ),
    ),
    Effect.catchAllDefect((defect) =>
      Effect.logError(`[RpcServer] ${path.join(".")} crashed`, defect).pipe(
        Effect.as(errorResponse(id, "InternalError", errorMessageOf(defect))),
      ),
    ),
  );
};

export interface ServeOptions<TContext> {
  input: NodeJS.ReadableStream;
  /** Receives one serialized response, without the newline */
  write: (line: string) => void;
  router: RouterRecord<TContext>;
  ctx: TContext;
}

/**
 * Serve requests until the input ends, then wait for the in-flight ones
 */
export const serveLines = <TContext>(options: ServeOptions<TContext>) =>
  Effect.gen(function* () {
    const runtime = yield* Effect.runtime<never>();
    const inflight = new Set<Fiber.RuntimeFiber<void>>();

    const respond = (line: string) =>
      handleLine(line, options.router, options.ctx).pipe(
        Effect.flatMap((response) =>
          response === undefined
            ? Effect.void
            : Effect.sync(() => options.write(JSON.stringify(response))),
        ),
      );

    yield* Effect.async<void>((resume) => {
      const rl = readline.createInterface({
        input: options.input,
        crlfDelay: Number.POSITIVE_INFINITY,
      });

      rl.on("line", (line: string) => {
        const fiber = Runtime.runFork(runtime)(respond(line));
        inflight.add(fiber);
        fiber.addObserver(() => {
          inflight.delete(fiber);
        });
      });

      rl.on("close", () => resume(Effect.void));

      return Effect.sync(() => rl.close());
    });

    yield* Effect.logDebug(
      `[RpcServer] Input closed with ${inflight.size} requests in flight`,
    );
    yield* Effect.forEach([...inflight], Fiber.await, { discard: true });
  });
