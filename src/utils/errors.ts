export class JournalError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JournalError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StoreWriteError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORE_WRITE_ERROR', options);
    this.name = 'StoreWriteError';
  }
}

export class StoreReadError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORE_READ_ERROR', options);
    this.name = 'StoreReadError';
  }
}

export class EntryValidationError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ENTRY_VALIDATION_ERROR', options);
    this.name = 'EntryValidationError';
  }
}

export class InvalidPeriodError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_PERIOD', options);
    this.name = 'InvalidPeriodError';
  }
}

export const SUMMARIZATION_FAILURE_REASONS = [
  'AUTH',
  'NETWORK',
  'QUOTA',
  'MALFORMED_RESPONSE',
  'UNKNOWN',
] as const;

export type SummarizationFailureReason = (typeof SUMMARIZATION_FAILURE_REASONS)[number];

export class AdapterError extends JournalError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

/** Raised by LLM adapters, already classified so callers never inspect SDK errors. */
export class LLMError extends AdapterError {
  public readonly reason: SummarizationFailureReason;

  constructor(message: string, reason: SummarizationFailureReason, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
    this.reason = reason;
  }
}

export class PromptError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('PROMPT', message, options);
    this.name = 'PromptError';
  }
}

export class SummarizationError extends JournalError {
  public readonly reason: SummarizationFailureReason;

  constructor(reason: SummarizationFailureReason, message: string, options?: ErrorOptions) {
    super(message, `SUMMARIZATION_${reason}`, options);
    this.name = 'SummarizationError';
    this.reason = reason;
  }
}

export class ReportWriteError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'REPORT_WRITE_ERROR', options);
    this.name = 'ReportWriteError';
  }
}

export class ConfigError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
