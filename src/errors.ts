export class StoreUnavailableError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Store unavailable during ${operation}${detail}`, options);
    this.name = "StoreUnavailableError";
  }
}

/** The log already holds this (reminder, occurrence) pair. Expected under concurrent cycles. */
export class DuplicateOccurrenceError extends Error {
  readonly reminderId: number;
  readonly occurrenceId: string;

  constructor(reminderId: number, occurrenceId: string) {
    super(`Occurrence ${occurrenceId} of reminder ${reminderId} is already logged`);
    this.name = "DuplicateOccurrenceError";
    this.reminderId = reminderId;
    this.occurrenceId = occurrenceId;
  }
}

export type ChannelErrorKind = "transient" | "permanent";

export class ChannelError extends Error {
  readonly kind: ChannelErrorKind;
  readonly retryAfterMs?: number;

  constructor(kind: ChannelErrorKind, message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, { cause: options?.cause });
    this.name = "ChannelError";
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class ReminderValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid reminder: ${issues.join("; ")}`);
    this.name = "ReminderValidationError";
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
