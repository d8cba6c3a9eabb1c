/**
 * Route engine error taxonomy.
 * `status` is read by the Express error handler, `retryable` tells the client it may resubmit.
 */
export class RouteEngineError extends Error {
  readonly code: string;
  readonly status: number;
  readonly retryable: boolean;

  constructor(code: string, message: string, status: number, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.retryable = retryable;
  }
}

export class NoCandidatesError extends RouteEngineError {
  constructor(message = "No matching places found for the given constraints") {
    super("NO_CANDIDATES", message, 404);
  }
}

export class UpstreamOracleError extends RouteEngineError {
  constructor(message: string, cause?: unknown) {
    super("UPSTREAM_ORACLE", message, 502, true, { cause });
  }
}

export class MatchExhaustionError extends RouteEngineError {
  readonly unmatchedNames: string[];

  constructor(unmatchedNames: string[]) {
    super("MATCH_EXHAUSTION", `None of the ${unmatchedNames.length} suggested places could be matched`, 422);
    this.unmatchedNames = unmatchedNames;
  }
}

export class ConstraintInfeasibleError extends RouteEngineError {
  constructor(message: string) {
    super("CONSTRAINT_INFEASIBLE", message, 422);
  }
}

export class SlugExhaustionError extends RouteEngineError {
  constructor(baseSlug: string, attempts: number) {
    super("SLUG_EXHAUSTION", `Could not find a free slug for "${baseSlug}" after ${attempts} attempts`, 409);
  }
}

export class AttractionNotFoundError extends RouteEngineError {
  constructor(attractionId: number) {
    super("ATTRACTION_NOT_FOUND", `Attraction ${attractionId} not found`, 404);
  }
}

export class RouteNotFoundError extends RouteEngineError {
  constructor(routeId: number) {
    super("ROUTE_NOT_FOUND", `Route ${routeId} not found`, 404);
  }
}

export class UserNotFoundError extends RouteEngineError {
  constructor(userId: string) {
    super("USER_NOT_FOUND", `User ${userId} not found`, 404);
  }
}
