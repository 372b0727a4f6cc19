export class PromptEngineError extends Error {
  constructor(message: string, public code: string, public cause?: Error) {
    super(message);
    this.name = "PromptEngineError";
  }
}

export class PromptStorageError extends PromptEngineError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, code, cause);
    this.name = "PromptStorageError";
  }
}

export interface ConfigValidationIssue {
  path: string;
  rule: string;
  message: string;
}

export class PromptConfigError extends PromptEngineError {
  constructor(
    message: string,
    code: string,
    public readonly issues: ConfigValidationIssue[] = [],
    cause?: Error,
  ) {
    super(message, code, cause);
    this.name = "PromptConfigError";
  }
}

export class DefaultStatusError extends PromptEngineError {
  constructor(message: string, cause?: Error) {
    super(message, "DEFAULT_STATUS_QUERY_FAILED", cause);
    this.name = "DefaultStatusError";
  }
}

export class PromptCoordinatorError extends PromptEngineError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, code, cause);
    this.name = "PromptCoordinatorError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
