/**
 * Raised when a pricing input violates a model precondition
 * (S > 0, K > 0, T >= 0, sigma > 0, all finite) or names an unknown
 * option kind / Greek. The engine never recovers from it.
 */
export class InvalidParameterError extends Error {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, reason: string) {
    super(`Invalid ${parameter} (${String(value)}): ${reason}`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.value = value;
  }
}

export function isInvalidParameter(err: unknown): err is InvalidParameterError {
  return err instanceof InvalidParameterError;
}
