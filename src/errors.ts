export type TrafficViewErrorKind =
  | "resource-not-found"
  | "malformed-topology"
  | "engine-unavailable"
  | "entity-lookup";

export abstract class TrafficViewError extends Error {
  abstract readonly kind: TrafficViewErrorKind;
}

export class ResourceNotFoundError extends TrafficViewError {
  readonly kind = "resource-not-found";
  readonly resource: string;

  constructor(resource: string, detail?: string) {
    super(detail ? `Resource not found: ${resource} (${detail})` : `Resource not found: ${resource}`);
    this.name = "ResourceNotFoundError";
    this.resource = resource;
  }
}

export class MalformedTopologyError extends TrafficViewError {
  readonly kind = "malformed-topology";

  constructor(message: string) {
    super(message);
    this.name = "MalformedTopologyError";
  }
}

export class EngineUnavailableError extends TrafficViewError {
  readonly kind = "engine-unavailable";
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "EngineUnavailableError";
    this.status = status;
  }
}

export class EntityLookupError extends TrafficViewError {
  readonly kind = "entity-lookup";
  readonly entityId: string;
  readonly attribute: string;

  constructor(entityId: string, attribute: string) {
    super(`No ${attribute} available for ${entityId}`);
    this.name = "EntityLookupError";
    this.entityId = entityId;
    this.attribute = attribute;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
