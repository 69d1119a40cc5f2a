import { constants } from "node:os";
import { execa } from "execa";
import { serverArgs } from "./config";
import { LauncherError, LauncherErrorCode } from "./errors";
import { debug } from "./log";

export type ServerExit = {
  command: string;
  exitCode?: number;
  signal?: string;
  failed: boolean;
  isTerminated: boolean;
};

/** Shell convention: a child killed by signal N reports 128 + N. */
export function exitCodeForSignal(signal: string) {
  for (const [name, signo] of Object.entries(constants.signals)) {
    if (name === signal && typeof signo === "number") return 128 + signo;
  }
  return 128;
}

export function exitCodeOf(result: ServerExit) {
  if (result.exitCode !== undefined) return result.exitCode;
  if (result.signal) return exitCodeForSignal(result.signal);
  if (result.isTerminated) return 128;
  if (result.failed) {
    throw new LauncherError(
      LauncherErrorCode.SERVER_SPAWN_FAILED,
      `Command failed to spawn: ${result.command}`,
      { command: result.command },
    );
  }
  return 0;
}

/**
 * Runs the interpreter's static file server in the foreground, serving the
 * current directory, and resolves with its exit code once it stops.
 * `executable` is the path the probe found, so PATH is not searched again.
 */
export async function runServer(executable: string, port: number) {
  // The terminal delivers Ctrl+C to the server too; the launcher outlives it to forward the code.
  const onInterrupt = () => debug("interrupt received, waiting for server to exit");
  process.on("SIGINT", onInterrupt);
  try {
    const args = serverArgs(port);
    debug("starting server", { executable, args, cwd: process.cwd() });
    const result = await execa(executable, args, {
      stdio: "inherit",
      reject: false,
    });
    return exitCodeOf(result);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
