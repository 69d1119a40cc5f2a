import fs from "node:fs";

const debugEnabled = !!process.env.LEARNCPP_PL_DEBUG;
const logFile = process.env.LEARNCPP_PL_LOG_FILE;

export function debug(message: string, data?: unknown) {
  if (!debugEnabled) return;
  const line = `[learncpp-pl debug] ${new Date().toISOString()} ${message}${data !== undefined ? ` ${JSON.stringify(data)}` : ""}`;
  process.stderr.write(`${line}\n`);
  if (logFile) fs.appendFileSync(logFile, `${line}\n`);
}

export function warn(message: string) {
  process.stderr.write(`[learncpp-pl warn] ${message}\n`);
}

export function error(message: string) {
  process.stderr.write(`[learncpp-pl error] ${message}\n`);
}
