import open from "open";
import { debug, warn } from "./log";

export async function openBrowser(url: string) {
  const report = (err: unknown) => {
    debug("browser open failed", { url, error: String(err) });
    warn(`Could not open a browser, visit ${url} manually.`);
  };
  try {
    const child = await open(url);
    child.once("error", report);
  } catch (err) {
    report(err);
  }
}
