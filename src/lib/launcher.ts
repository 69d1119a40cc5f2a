import { siteUrl } from "./config";
import { LauncherError, LauncherErrorCode } from "./errors";
import { debug } from "./log";
import { selectInterpreter } from "./probe";

export const NOT_FOUND_MESSAGE = [
  "Nie znaleziono Pythona w systemie.",
  "Zainstaluj Pythona 3 ze strony https://www.python.org/downloads/ i uruchom ponownie.",
] as const;

export const PAUSE_PROMPT = "Naciśnij dowolny klawisz, aby kontynuować . . . ";

export const EXIT_INTERPRETER_NOT_FOUND = 1;

export type LaunchOptions = {
  /** Directory the site is served from; becomes the working directory. */
  rootDir: string;
  port: number;
  candidates: readonly string[];
  chdir: (dir: string) => void;
  locate: (command: string) => string | undefined;
  openBrowser: (url: string) => Promise<void>;
  runServer: (executable: string, port: number) => Promise<number>;
  waitForKeypress: () => Promise<void>;
  write: (text: string) => void;
};

/**
 * Opens the mirrored site in the default browser and serves it until the
 * server stops. Resolves with the exit code the process should end with.
 */
export async function launch(opts: LaunchOptions) {
  try {
    opts.chdir(opts.rootDir);
  } catch (err) {
    throw new LauncherError(
      LauncherErrorCode.LAUNCH_DIR_UNAVAILABLE,
      `Cannot enter ${opts.rootDir}`,
      { cause: err instanceof Error ? err.message : String(err) },
    );
  }

  const interpreter = selectInterpreter(opts.candidates, opts.locate);
  if (!interpreter) {
    opts.write(`${NOT_FOUND_MESSAGE.join("\n")}\n`);
    opts.write(PAUSE_PROMPT);
    await opts.waitForKeypress();
    opts.write("\n");
    return EXIT_INTERPRETER_NOT_FOUND;
  }
  debug("interpreter selected", interpreter);

  await opts.openBrowser(siteUrl(opts.port));
  const code = await opts.runServer(interpreter.path, opts.port);
  debug("server exited", { code });
  return code;
}
