/** Runway polygon configuration cannot be used (too few vertices, bad coordinates, self-intersecting) */
export class InvalidGeometryError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `Invalid runway polygon (${source}): ${message}` : `Invalid runway polygon: ${message}`);
    this.name = "InvalidGeometryError";
  }
}

/** Enrichment was asked to run but there are no pings to classify */
export class EmptyPingSetError extends Error {
  constructor(message = "No pings to classify") {
    super(message);
    this.name = "EmptyPingSetError";
  }
}

/** The containment predicate is missing; running without it would corrupt every label */
export class GeometryUnavailableError extends Error {
  constructor(message = "Runway geometry predicate is not available") {
    super(message);
    this.name = "GeometryUnavailableError";
  }
}
