/**
 * Adapted from https://stackoverflow.com/a/65243177
 */
export class CustomError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
