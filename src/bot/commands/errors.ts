export class BotError extends Error {
  readonly code: number;

  constructor(message: string, code: number, options?: { cause?: unknown }) {
    super(`Error code: ${code}\n${message}`, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Malformed binding: empty trigger set, blank trigger, no prefixes, unknown scope token.
export class InvalidConfigurationError extends BotError {
  constructor(message: string) {
    super(message, 100);
  }
}

export class DuplicateBindingError extends BotError {
  readonly prefix: string;
  readonly trigger: string;

  constructor(prefix: string, trigger: string) {
    super(`Command "${prefix}${trigger}" is already bound in an overlapping scope.`, 101);
    this.prefix = prefix;
    this.trigger = trigger;
  }
}

export class HandlerError extends BotError {
  readonly trigger: string;

  constructor(trigger: string, cause: unknown) {
    super(`Command "${trigger}" failed: ${describeCause(cause)}`, 500, { cause });
    this.trigger = trigger;
  }
}

export class HandlerTimeoutError extends BotError {
  readonly timeoutMs: number;

  constructor(trigger: string, timeoutMs: number) {
    super(`Command "${trigger}" did not finish within ${timeoutMs}ms.`, 504);
    this.timeoutMs = timeoutMs;
  }
}

export class EmptyContentError extends BotError {
  constructor() {
    super('Message content must not be empty.', 200);
  }
}

export class ContentTypeError extends BotError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class IncompatibilityError extends BotError {
  constructor(message: string) {
    super(message, 500);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
