export type KeyInput = {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  once(event: "data", listener: () => void): unknown;
};

/** Resolves on the next key press. Without a terminal there is nothing to wait for. */
export function waitForKeypress(input: KeyInput = process.stdin) {
  if (!input.isTTY) return Promise.resolve();
  return new Promise<void>((resolve) => {
    input.setRawMode(true);
    input.resume();
    input.once("data", () => {
      input.setRawMode(false);
      input.pause();
      resolve();
    });
  });
}
