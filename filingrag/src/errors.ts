export class FilingRagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FilingRagError";
  }
}

/** Bad chunker, retrieval or routing parameters. Raised at construction time. */
export class InvalidConfigError extends FilingRagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidConfigError";
  }
}

/**
 * Cache metadata and the vector index disagree, or a failed write could not be
 * rolled back. Never healed automatically.
 */
export class CacheInconsistencyError extends FilingRagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CacheInconsistencyError";
  }
}

/** A cache write failed and the previous state was restored. */
export class CachePersistenceError extends FilingRagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CachePersistenceError";
  }
}

export class NoProviderRegisteredError extends FilingRagError {
  constructor() {
    super("No generation provider registered");
    this.name = "NoProviderRegisteredError";
  }
}

export class GenerationFailedError extends FilingRagError {
  constructor(
    public readonly providerName: string,
    cause: unknown
  ) {
    super(`Generation failed on provider "${providerName}": ${describeError(cause)}`, { cause });
    this.name = "GenerationFailedError";
  }
}

export class CompanyNotResolvedError extends FilingRagError {
  constructor(public readonly companyName: string) {
    super(`Company not found: ${companyName}`);
    this.name = "CompanyNotResolvedError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
