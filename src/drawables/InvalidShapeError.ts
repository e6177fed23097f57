/** Thrown when a shape definition is invalid at construction time. Not recoverable. */
export class InvalidShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidShapeError';
  }
}
