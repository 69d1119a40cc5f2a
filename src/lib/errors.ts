export enum LauncherErrorCode {
  LAUNCH_DIR_UNAVAILABLE = "LAUNCH_DIR_UNAVAILABLE",
  SERVER_SPAWN_FAILED = "SERVER_SPAWN_FAILED",
}

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: LauncherErrorCode,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LauncherError";
    this.code = code;
    this.context = context;
  }
}
