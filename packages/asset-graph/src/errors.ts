// Error types shared by the model, the visualization boundary and the loaders

/**
 * Raised when an asset or regulatory event fails validation at creation time.
 * Such records never reach the relationship store.
 */
export class ConstructionError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConstructionError';
  }
}

/**
 * Raised where external or cached data re-enters the core: relationship
 * edges, requested id lists, position arrays and snapshot payloads.
 */
export class StructuralValidationError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'StructuralValidationError';
  }
}

export class MarketDataError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'MarketDataError';
  }
}
