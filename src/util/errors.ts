export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export function assertInteger(name: string, value: number) {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`Expected an integer for '${name}' but got ${value}`);
  }
}
