/** Raised when a bearing, angle or setting is non-finite or outside its valid range. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export function assertFinite(value: number, what: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${what} must be a finite number, got ${value}`);
  }
}
