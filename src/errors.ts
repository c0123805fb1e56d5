export type OptionsErrorKind = 'InvalidArgument' | 'MissingValue' | 'ValueConversionFailure' | 'SpecDefinition';

/**
 * Base class of every failure raised while compiling specs or parsing arguments.
 * `kind` lets callers of `safeParseArgs` switch over the failure without `instanceof`.
 */
export abstract class OptionsError extends Error {
  abstract readonly kind: OptionsErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An option-prefixed token matched no declared switch. */
export class InvalidArgumentError extends OptionsError {
  readonly kind = 'InvalidArgument' as const;

  constructor(readonly token: string) {
    super(`'${token}' is not a valid argument`);
  }
}

/**
 * A value option was the last token, so there is nothing to parse. This is a
 * failure of its own, separate from unknown switches and failed conversions:
 * the option's `parse` function is not called at all.
 */
export class MissingValueError extends OptionsError {
  readonly kind = 'MissingValue' as const;

  constructor(readonly token: string) {
    super(`'${token}' requires a value`);
  }
}

export class ValueConversionError extends OptionsError {
  readonly kind = 'ValueConversionFailure' as const;

  constructor(
    readonly token: string,
    readonly raw: string,
    readonly optionName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid value '${raw}' for '${token}': ${reason}`, { cause });
  }
}

export class SpecDefinitionError extends OptionsError {
  readonly kind = 'SpecDefinition' as const;
}

export function isOptionsError(e: unknown): e is OptionsError {
  return e instanceof OptionsError;
}
