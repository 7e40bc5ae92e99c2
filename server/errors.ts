/** A client mistake in the request itself; answered with 400 and no side effects. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}
