#!/usr/bin/env tsx

import { openBrowser } from "./lib/browser";
import { interpreterCandidates, packageRoot, PORT } from "./lib/config";
import { LauncherError } from "./lib/errors";
import { launch } from "./lib/launcher";
import { error } from "./lib/log";
import { findExecutable } from "./lib/probe";
import { waitForKeypress } from "./lib/prompt";
import { runServer } from "./lib/server";

try {
  process.exitCode = await launch({
    rootDir: packageRoot(),
    port: PORT,
    candidates: interpreterCandidates(),
    chdir: (dir) => process.chdir(dir),
    locate: (command) => findExecutable(command),
    openBrowser,
    runServer,
    waitForKeypress: () => waitForKeypress(),
    write: (text) => process.stdout.write(text),
  });
} catch (err) {
  if (!(err instanceof LauncherError)) throw err;
  error(`${err.message} (${err.code})`);
  process.exitCode = 1;
}
