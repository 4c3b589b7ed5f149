/**
 * Error taxonomy for catalog inspection.
 *
 * Every failure that ends an invocation is one of these classes so the CLI
 * can tell a missing object apart from an unreachable catalog or a failed
 * graph render.
 */

export class PgDependentsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The catalog connection could not be opened or a catalog query failed.
 */
export class CatalogUnavailableError extends PgDependentsError {
  constructor(public readonly operation: string, cause: unknown) {
    super(`Catalog unavailable during ${operation}: ${describeCause(cause)}`, { cause });
  }
}

export class ObjectNotFoundError extends PgDependentsError {
  constructor(public readonly schema: string, public readonly objectName: string) {
    super(`Object "${schema}.${objectName}" does not exist`);
  }
}

/**
 * The graph rendering backend failed. The cascade itself succeeded.
 */
export class RenderBackendError extends PgDependentsError {
  constructor(
    public readonly format: string,
    public readonly outputPath: string,
    cause: unknown
  ) {
    super(`Failed to render ${format} graph to ${outputPath}: ${describeCause(cause)}`, { cause });
  }
}

export class CascadeAbortedError extends PgDependentsError {
  constructor(public readonly depth: number, cause?: unknown) {
    super(`Cascade aborted before expanding level ${depth}`, { cause });
  }
}

export class InvalidOptionError extends PgDependentsError {
  constructor(public readonly option: string, public readonly value: unknown) {
    super(`Invalid value for ${option}: ${String(value)}`);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
