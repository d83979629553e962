/**
 * CommandRunner
 * Runs one executable command and turns its outcome into an ExecutionResult.
 *
 * Spawn failures and non-zero exits are captured into a failed result;
 * `run` itself cannot fail.
 */

import { spawn } from "node:child_process";
import * as path from "node:path";
import type {
  ExecutableCommand,
  ExecutionResult,
} from "@taskdeck/catalog-protocol";
import { Context, Effect, Layer } from "effect";
import { NonZeroExitError, SpawnFailureError } from "./errors.js";
import type { ExecutionRequest } from "./types.js";

/**
 * Keeps package managers and service restarters from prompting
 */
export const NONINTERACTIVE_ENV = {
  DEBIAN_FRONTEND: "noninteractive",
  NEEDRESTART_MODE: "a",
} as const;

interface ProcessOutput {
  stdout: string;
  stderr: string;
  /** null when the process was terminated by a signal */
  exitCode: number | null;
}

export class CommandRunner extends Context.Tag("CommandRunner")<
  CommandRunner,
  {
    readonly run: (request: ExecutionRequest) => Effect.Effect<ExecutionResult>;
  }
>() {}

function labelFor(command: ExecutableCommand): "Command" | "Script" {
  return command.type === "raw" ? "Command" : "Script";
}

const runProcess = (
  executable: string,
  args: ReadonlyArray<string>,
  cwd: string | undefined,
  label: "Command" | "Script",
) =>
  Effect.async<ProcessOutput, SpawnFailureError>((resume) => {
    const verb = label === "Command" ? "command" : "script";
    let settled = false;
    const settle = (effect: Effect.Effect<ProcessOutput, SpawnFailureError>) => {
      if (settled) return;
      settled = true;
      resume(effect);
    };

    let child: ReturnType<typeof spawnPiped>;
    try {
      child = spawnPiped(executable, args, cwd);
    } catch (error) {
      settle(
        Effect.fail(
          new SpawnFailureError({
            message: `Failed to execute ${verb}: ${error instanceof Error ? error.message : String(error)}`,
            executable,
          }),
        ),
      );
      return;
    }

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (error) => {
      settle(
        Effect.fail(
          new SpawnFailureError({
            message: `Failed to execute ${verb}: ${error.message}`,
            executable,
          }),
        ),
      );
    });

    child.on("close", (code) => {
      settle(
        Effect.succeed({
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          exitCode: code,
        }),
      );
    });

    // Only reached when the owning scope shuts down
    return Effect.sync(() => {
      if (!settled) child.kill();
    });
  });

function spawnPiped(
  executable: string,
  args: ReadonlyArray<string>,
  cwd: string | undefined,
) {
  return spawn(executable, args, {
    cwd,
    env: { ...process.env, ...NONINTERACTIVE_ENV },
    stdio: ["ignore", "pipe", "pipe"],
  });
}

const execute = (command: ExecutableCommand) => {
  const label = labelFor(command);
  if (command.type === "raw") {
    return runProcess("sh", ["-c", command.command], undefined, label);
  }
  return runProcess(
    command.executable,
    command.args,
    path.dirname(command.file),
    label,
  );
};

/**
 * Stdout if non-empty, else stderr if non-empty, else a placeholder
 */
export function displayedOutput(
  output: { stdout: string; stderr: string },
  label: "Command" | "Script",
): string {
  if (output.stdout.length > 0) return output.stdout;
  if (output.stderr.length > 0) return output.stderr;
  return `${label} executed successfully`;
}

const run = (request: ExecutionRequest): Effect.Effect<ExecutionResult> => {
  const label = labelFor(request.command);
  const base = {
    requestId: request.requestId,
    category: request.category,
    nodeId: request.nodeId,
    name: request.name,
  };

  return Effect.gen(function* () {
    yield* Effect.logDebug(
      `[CommandRunner] Running ${request.command.type} command for ${request.name}`,
    );
    const output = yield* execute(request.command);
    const displayed = displayedOutput(output, label);

    if (output.exitCode !== 0) {
      return yield* Effect.fail(
        new NonZeroExitError({
          message: `${label} exited with ${output.exitCode === null ? "a signal" : `code ${output.exitCode}`}`,
          exitCode: output.exitCode ?? undefined,
          stderr: output.stderr,
          output: displayed,
        }),
      );
    }

    const result: ExecutionResult = {
      ...base,
      success: true,
      output: displayed,
      exitCode: 0,
    };
    return result;
  }).pipe(
    Effect.catchTags({
      NonZeroExit: (error) =>
        Effect.logDebug(`[CommandRunner] ${request.name}: ${error.message}`).pipe(
          Effect.as<ExecutionResult>({
            ...base,
            success: false,
            output: error.output,
            error: error.stderr,
            exitCode: error.exitCode,
          }),
        ),
      SpawnFailure: (error) =>
        Effect.logWarning(`[CommandRunner] ${error.message}`).pipe(
          Effect.as<ExecutionResult>({
            ...base,
            success: false,
            output: error.message,
            error: error.message,
          }),
        ),
    }),
  );
};

export const CommandRunnerLive = Layer.succeed(CommandRunner, { run });
