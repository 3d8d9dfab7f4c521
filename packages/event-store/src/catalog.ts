/**
 * @ledgerline/event-store: Event catalog.
 *
 * Registry of known event types with a payload validator per type.
 * The catalog documents what the log may contain and lets producers
 * check a payload before it is appended.
 */

import type { EventSource } from "@ledgerline/types";

/**
 * A versioned event schema.
 */
export interface EventSchema {
  /** Event type string (e.g., "invoice.created") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;
  readonly source: EventSource;

  validate(payload: unknown): boolean;
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register a schema. Re-registering the same version is a no-op;
   * a different version replaces the existing schema.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${String(schema.version)}`,
      );
    }
    if (this._schemas.get(schema.type)?.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * False for an unregistered type.
   */
  validate(eventType: string, payload: unknown): boolean {
    return this._schemas.get(eventType)?.validate(payload) ?? false;
  }

  /**
   * Like validate(), but throws CatalogError.
   */
  assertValid(eventType: string, payload: unknown): void {
    if (!this.has(eventType)) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }
    if (!this.validate(eventType, payload)) {
      throw new CatalogError(`Payload does not match schema "${eventType}"`);
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
