/**
 * Raised for caller mistakes (empty user id, unknown role, empty content).
 * Storage problems never surface as errors; they are logged and recovered.
 */
export class InvalidArgumentError extends Error {
  readonly code = "INVALID_ARGUMENT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
