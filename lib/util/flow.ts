/**
 * An error whose message is meant for the user
 *
 * The CLI prints these without a stack trace.
 */
export class SimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
