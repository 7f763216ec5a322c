/** Raised by the host model layer for persistence misuse, such as inserting a record twice. */
export class ModelPersistenceError extends Error {
  constructor(
    message: string,
    readonly table?: string,
  ) {
    super(message);
    this.name = 'ModelPersistenceError';
  }
}
