export class ConnectionFailureError extends Error {
  constructor(
    public readonly source: string,
    cause: unknown
  ) {
    super(`Error connecting to ${source}: ${describeError(cause)}`, { cause });
    this.name = 'ConnectionFailureError';
  }
}

export class LookupMissError extends Error {
  constructor(public readonly target: string) {
    super(`Definition not found for ${target}`);
    this.name = 'LookupMissError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
