// Error types for timetrack domain

export type TtErrorCode =
  | "already_tracking"
  | "not_tracking"
  | "nothing_to_continue"
  | "corrupt_store"
  | "io_error"
  | "invalid_time"
  | "invalid_args"
  | "invalid_config";

export class TtError extends Error {
  constructor(
    public readonly code: TtErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TtError";
  }

  toJSON(): { error: string; code: TtErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
