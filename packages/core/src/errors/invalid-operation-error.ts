export class InvalidOperationError extends Error {
  public readonly directive: string;

  constructor(directive: string) {
    super(`Invalid operation on cache directive "${directive}": it carries no delta`);
    this.name = 'InvalidOperationError';
    this.directive = directive;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
