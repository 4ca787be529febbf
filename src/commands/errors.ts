export class CommandFrameworkError extends Error {
  readonly code: string = "COMMAND_FRAMEWORK_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed command declaration, raised while compiling a command at registration time. */
export class ProcessingError extends CommandFrameworkError {
  override readonly code = "PROCESSING_ERROR";

  constructor(
    readonly command: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to process command '${command}': ${message}`, options);
  }
}

export abstract class ArgumentParseError extends CommandFrameworkError {}

export class MissingArgumentError extends ArgumentParseError {
  override readonly code = "MISSING_ARGUMENT";

  constructor(readonly argument: string) {
    super(`Missing required argument: ${argument}`);
  }
}

export class InvalidArgumentValueError extends ArgumentParseError {
  override readonly code = "INVALID_ARGUMENT_VALUE";

  constructor(
    readonly argument: string,
    readonly input: string,
    readonly reason: ArgumentValueReason,
    readonly details: Readonly<Record<string, string | number>> = {},
    options?: { cause?: unknown },
  ) {
    super(`Invalid value '${input}' for argument ${argument}: ${reason}`, options);
  }
}

export class TooManyArgumentsError extends ArgumentParseError {
  override readonly code = "TOO_MANY_ARGUMENTS";

  constructor(
    readonly expected: number,
    readonly got: number,
  ) {
    super(`Too many arguments: expected ${expected}, got ${got}`);
  }
}

export class UnknownArgumentTypeError extends ArgumentParseError {
  override readonly code = "UNKNOWN_ARGUMENT_TYPE";

  constructor(
    readonly argument: string,
    readonly typeName: string,
  ) {
    super(`Unknown argument type '${typeName}' for argument ${argument}`);
  }
}

export class PermissionDeniedError extends CommandFrameworkError {
  override readonly code = "PERMISSION_DENIED";

  constructor(readonly permission: string) {
    super(`Missing permission: ${permission}`);
  }
}

export type SenderRequirement = "player" | "console";

export class InvalidSenderError extends CommandFrameworkError {
  override readonly code = "INVALID_SENDER";

  constructor(readonly required: SenderRequirement) {
    super(`This command can only be used by a ${required}`);
  }
}

export class CooldownActiveError extends CommandFrameworkError {
  override readonly code = "COOLDOWN_ACTIVE";

  constructor(
    readonly key: string,
    readonly remainingMs: number,
  ) {
    super(`Cooldown active for ${key}: ${remainingMs}ms remaining`);
  }
}

export class HandlerInvocationError extends CommandFrameworkError {
  override readonly code = "HANDLER_INVOCATION_FAILED";

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(
      `Command '${path}' failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export type ArgumentValueReason =
  | "invalid-number"
  | "number-out-of-range"
  | "invalid-boolean"
  | "invalid-enum"
  | "actor-not-online"
  | "world-not-found"
  | "invalid-value";

/**
 * Thrown by argument types when raw input cannot be converted. The argument parser
 * rewraps it as an {@link InvalidArgumentValueError} carrying the argument name.
 */
export class ArgumentValueError extends Error {
  readonly code = "ARGUMENT_VALUE";

  constructor(
    readonly input: string,
    readonly reason: ArgumentValueReason,
    readonly details: Readonly<Record<string, string | number>> = {},
  ) {
    super(`Invalid value '${input}': ${reason}`);
    this.name = "ArgumentValueError";
  }
}
