export class QueryTreeError extends Error {
  override readonly name: string = 'QueryTreeError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends QueryTreeError {
  override readonly name = 'NotFoundError';

  constructor(
    readonly path: string,
    readonly segment: string,
    message?: string,
  ) {
    super(message ?? `No query labeled "${segment}" while resolving "${path}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidArgumentError extends QueryTreeError {
  override readonly name = 'InvalidArgumentError';

  constructor(
    readonly argument: string,
    readonly value: unknown,
    message?: string,
  ) {
    super(message ?? `Invalid value for ${argument}: ${String(value)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedDefinitionError extends QueryTreeError {
  override readonly name = 'MalformedDefinitionError';

  constructor(
    readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Malformed definition at "${path || '#root'}": ${message}`, cause);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
