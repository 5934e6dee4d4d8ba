// =============================================================================
// CacheConfigError — Typed error for invalid cache construction options
// =============================================================================
// The only error the cache ever throws.  Raised by the CacheStore
// constructor before any structure is built; lookups and writes never
// throw (absence is `undefined`).
// =============================================================================

export class CacheConfigError extends Error {
  /** Option names that failed validation, e.g. `['capacity']` */
  public readonly options: string[];
  /** One human-readable line per validation failure */
  public readonly issues: string[];

  constructor(options: string[], issues: string[]) {
    super(`Invalid cache configuration: ${issues.join('; ')}`);
    this.name = 'CacheConfigError';
    this.options = options;
    this.issues = issues;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, CacheConfigError.prototype);
  }
}

/**
 * Turn whatever was thrown into a message suitable for log metadata.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
