import { RoundResult } from "./types";

export class BlackjackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised when a draw hits an empty shoe. The reshuffle threshold keeps this unreachable. */
export class EmptyShoeError extends BlackjackError {
  constructor() {
    super("Cannot deal from an empty shoe");
  }
}

export class RoundLogWriteError extends BlackjackError {
  readonly path: string;
  readonly round: RoundResult | undefined;

  constructor(path: string, cause: unknown, round?: RoundResult) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to append round to ${path}: ${reason}`, { cause });
    this.path = path;
    this.round = round;
  }
}

export class ConfigError extends BlackjackError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid table configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
