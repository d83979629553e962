import { execFile } from "node:child_process";
import * as fs from "node:fs/promises";
import type { SystemInfo } from "@taskdeck/catalog-protocol";
import { Effect } from "effect";

/**
 * Trimmed stdout of a command, or undefined when it fails or prints nothing
 */
const probe = (command: string, args: ReadonlyArray<string>) =>
  Effect.async<string | undefined>((resume) => {
    const child = execFile(command, args, { encoding: "utf8" }, (error, stdout) => {
      const output = stdout.trim();
      resume(Effect.succeed(error || output.length === 0 ? undefined : output));
    });
    return Effect.sync(() => {
      child.kill();
    });
  });

/**
 * "Description:\tUbuntu 22.04.4 LTS" -> "Ubuntu 22.04.4 LTS"
 */
export function parseLsbDescription(output: string): string | undefined {
  const match = /^Description:\s*(.+)$/m.exec(output);
  return match?.[1]?.trim() || undefined;
}

/**
 * PRETTY_NAME of an os-release file, unquoted
 */
export function parseOsReleasePrettyName(content: string): string | undefined {
  for (const line of content.split("\n")) {
    if (line.startsWith("PRETTY_NAME=")) {
      const value = line
        .slice("PRETTY_NAME=".length)
        .trim()
        .replace(/^["']|["']$/g, "");
      return value || undefined;
    }
  }
  return undefined;
}

const distribution = Effect.gen(function* () {
  const lsb = yield* probe("lsb_release", ["-d"]);
  const fromLsb = lsb === undefined ? undefined : parseLsbDescription(lsb);
  if (fromLsb !== undefined) {
    return fromLsb;
  }

  return yield* Effect.tryPromise(() =>
    fs.readFile("/etc/os-release", "utf-8"),
  ).pipe(
    Effect.map(parseOsReleasePrettyName),
    Effect.catchAll((error) =>
      Effect.logDebug("[SystemInfo] /etc/os-release unavailable", error).pipe(
        Effect.as(undefined),
      ),
    ),
  );
});

/**
 * Host description; a probe that fails leaves its key out
 */
export const getSystemInfo: Effect.Effect<SystemInfo> = Effect.gen(function* () {
  const [system, distro, architecture] = yield* Effect.all(
    [probe("uname", ["-a"]), distribution, probe("uname", ["-m"])],
    { concurrency: "unbounded" },
  );

  const info: SystemInfo = {};
  if (system !== undefined) info.system = system;
  if (distro !== undefined) info.distribution = distro;
  if (architecture !== undefined) info.architecture = architecture;
  return info;
});
