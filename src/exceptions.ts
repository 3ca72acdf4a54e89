/**
 * Custom exception classes for the reaction tokenizer
 */

export class MissingSpecialTokenError extends Error {
  public token: string;

  constructor(token: string) {
    super(`${token} token is missing in vocabulary!`);
    this.name = 'MissingSpecialTokenError';
    this.token = token;
    Object.setPrototypeOf(this, MissingSpecialTokenError.prototype);
  }
}
