import path from "node:path";
import { fileURLToPath } from "node:url";

export const PORT = 8765;
export const SITE_ENTRY = "www.learncpp.com/index.html";

export type Platform = NodeJS.Platform;

/** Directory holding package.json and the mirrored site; the server's root. */
export function packageRoot() {
  return path.resolve(fileURLToPath(new URL("../..", import.meta.url)));
}

/** Interpreters tried in order; the first one found on PATH serves the site. */
export function interpreterCandidates(platform: Platform = process.platform) {
  return platform === "win32"
    ? (["py", "python"] as const)
    : (["python3", "python"] as const);
}

export function siteUrl(port: number) {
  return `http://127.0.0.1:${port}/${SITE_ENTRY}`;
}

export function serverArgs(port: number) {
  return ["-m", "http.server", String(port)];
}
