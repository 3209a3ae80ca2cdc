/**
 * The base class for every error raised by this package.
 * @class BaseError
 * @extends {Error}
 */
class BaseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export { BaseError };
