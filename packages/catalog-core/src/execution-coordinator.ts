/**
 * ExecutionCoordinator
 * Serializes execution requests onto one worker fiber and hands results back.
 *
 * - `submit` enqueues and returns immediately
 * - exactly one worker takes requests in FIFO order, so executions never overlap
 * - results wait in a second queue until the interactive layer polls them
 *
 * The worker is forked into the layer's scope and is interrupted with it.
 */

import type {
  BusyIndicatorMode,
  ExecutionResult,
} from "@taskdeck/catalog-protocol";
import { Context, Effect, Layer, Option, Queue, Ref } from "effect";
import { CommandRunner } from "./command-runner.js";
import type { ExecutionRequest, RequestStatus } from "./types.js";

export interface ExecutionCoordinatorOptions {
  busyIndicator: BusyIndicatorMode;
}

interface CoordinatorState {
  /** Submitted requests whose result has not been observed yet */
  pending: number;
  executing: boolean;
  statuses: Map<string, RequestStatus>;
}

export class ExecutionCoordinator extends Context.Tag("ExecutionCoordinator")<
  ExecutionCoordinator,
  {
    readonly submit: (request: ExecutionRequest) => Effect.Effect<void>;
    /** Next ready result, or undefined when none has arrived yet */
    readonly poll: Effect.Effect<ExecutionResult | undefined>;
    /** Suspend until the next result arrives */
    readonly take: Effect.Effect<ExecutionResult>;
    readonly isExecuting: Effect.Effect<boolean>;
    readonly pending: Effect.Effect<number>;
    /** Undefined once the result has been observed */
    readonly statusOf: (
      requestId: string,
    ) => Effect.Effect<RequestStatus | undefined>;
  }
>() {}

const makeExecutionCoordinator = (options: ExecutionCoordinatorOptions) =>
  Effect.gen(function* () {
    const runner = yield* CommandRunner;
    const requests = yield* Queue.unbounded<ExecutionRequest>();
    const results = yield* Queue.unbounded<ExecutionResult>();
    const stateRef = yield* Ref.make<CoordinatorState>({
      pending: 0,
      executing: false,
      statuses: new Map(),
    });

    yield* Effect.addFinalizer(() =>
      Effect.zipRight(
        Queue.shutdown(requests),
        Queue.shutdown(results),
      ),
    );

    const setStatus = (requestId: string, status: RequestStatus) =>
      Ref.update(stateRef, (state) => ({
        ...state,
        statuses: new Map(state.statuses).set(requestId, status),
      }));

    const runOne = (request: ExecutionRequest) =>
      runner.run(request).pipe(
        // A defect in the runner must not stop the queue behind it
        Effect.catchAllDefect((defect) =>
          Effect.logError(
            `[ExecutionCoordinator] Runner defect for ${request.name}`,
            defect,
          ).pipe(
            Effect.as<ExecutionResult>({
              requestId: request.requestId,
              category: request.category,
              nodeId: request.nodeId,
              name: request.name,
              success: false,
              output: `Execution error: ${String(defect)}`,
              error: String(defect),
            }),
          ),
        ),
      );

    const worker = Effect.gen(function* () {
      const request = yield* Queue.take(requests);
      yield* setStatus(request.requestId, "dispatched");
      yield* Effect.logDebug(
        `[ExecutionCoordinator] Dispatched ${request.name} (${request.requestId})`,
      );

      const result = yield* runOne(request);

      yield* setStatus(request.requestId, "completed");
      yield* Queue.offer(results, result);
      yield* Effect.logDebug(
        `[ExecutionCoordinator] Completed ${request.name} (success=${result.success})`,
      );
    }).pipe(Effect.forever);

    yield* Effect.forkScoped(worker);

    const submit = (request: ExecutionRequest) =>
      Effect.gen(function* () {
        yield* Ref.update(stateRef, (state) => ({
          pending: state.pending + 1,
          executing: true,
          statuses: new Map(state.statuses).set(request.requestId, "queued"),
        }));
        yield* Queue.offer(requests, request);
      });

    const observe = (result: ExecutionResult) =>
      Ref.update(stateRef, (state) => {
        const pending = Math.max(0, state.pending - 1);
        const statuses = new Map(state.statuses);
        statuses.delete(result.requestId);
        return {
          pending,
          statuses,
          executing:
            options.busyIndicator === "first-result" ? false : pending > 0,
        };
      });

    const poll = Queue.poll(results).pipe(
      Effect.flatMap((next) =>
        Option.match(next, {
          onNone: () => Effect.succeed<ExecutionResult | undefined>(undefined),
          onSome: (result) =>
            observe(result).pipe(
              Effect.as<ExecutionResult | undefined>(result),
            ),
        }),
      ),
    );

    const take = Queue.take(results).pipe(Effect.tap(observe));

    const isExecuting = Ref.get(stateRef).pipe(
      Effect.map((state) => state.executing),
    );

    const pending = Ref.get(stateRef).pipe(
      Effect.map((state) => state.pending),
    );

    const statusOf = (requestId: string) =>
      Ref.get(stateRef).pipe(
        Effect.map((state) => state.statuses.get(requestId)),
      );

    return { submit, poll, take, isExecuting, pending, statusOf };
  });

export const makeExecutionCoordinatorLive = (
  options: ExecutionCoordinatorOptions = { busyIndicator: "pending" },
) => Layer.scoped(ExecutionCoordinator, makeExecutionCoordinator(options));

/**
 * Default coordinator; needs a CommandRunner
 */
export const ExecutionCoordinatorLive = makeExecutionCoordinatorLive();
