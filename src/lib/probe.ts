import { accessSync, constants, statSync } from "node:fs";
import path from "node:path";
import type { Platform } from "./config";

export type ProbeEnv = {
  PATH?: string;
  Path?: string;
  PATHEXT?: string;
};

export type Interpreter = {
  command: string;
  path: string;
};

function isExecutableFile(filePath: string, platform: Platform) {
  try {
    if (!statSync(filePath).isFile()) return false;
    if (platform !== "win32") accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function searchDirs(env: ProbeEnv, platform: Platform) {
  // Windows keeps the variable as "Path"; environment lookups there are case-insensitive.
  const raw = env.PATH ?? env.Path ?? "";
  const delimiter = platform === "win32" ? ";" : ":";
  return raw.split(delimiter).filter((dir) => dir.length > 0);
}

function nameVariants(name: string, env: ProbeEnv, platform: Platform) {
  if (platform !== "win32") return [name];
  const exts = (env.PATHEXT || ".COM;.EXE;.BAT;.CMD")
    .split(";")
    .filter((ext) => ext.length > 0);
  return exts.map((ext) => `${name}${ext.toLowerCase()}`);
}

/**
 * Locates `name` on the executable search path.
 * Returns the absolute path of the first match, or undefined.
 */
export function findExecutable(
  name: string,
  env: ProbeEnv = process.env,
  platform: Platform = process.platform,
) {
  for (const dir of searchDirs(env, platform)) {
    for (const variant of nameVariants(name, env, platform)) {
      const candidate = path.resolve(dir, variant);
      if (isExecutableFile(candidate, platform)) return candidate;
    }
  }
  return undefined;
}

export function selectInterpreter(
  candidates: readonly string[],
  locate: (name: string) => string | undefined = (name) =>
    findExecutable(name),
): Interpreter | undefined {
  for (const command of candidates) {
    const found = locate(command);
    if (found) return { command, path: found };
  }
  return undefined;
}
