import type { Destination, JournalEvent } from '../domain/index.js';
import { DeliveryFailure, assertValidPath, pathMatches } from '../domain/index.js';

export type DeliveryResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: DeliveryFailure };

/**
 * A subscription of one destination to a subtree of the path hierarchy.
 *
 * A scoped listener only sees events of its own scope. A global listener
 * (`scope` null) sees every event, whatever its scope.
 *
 * Implementations must not throw from `deliver`: failures are reported
 * through the returned DeliveryResult so the router can move on.
 */
export abstract class OutputListener {
  readonly path: string;
  readonly recursive: boolean;
  readonly scope: string | null;
  /** Mutable so a subscription can be relocated without re-registering. */
  destination: Destination;

  constructor(path: string, recursive: boolean, destination: Destination, scope: string | null = null) {
    assertValidPath(path);
    this.path = path;
    this.recursive = recursive;
    this.destination = destination;
    this.scope = scope;
  }

  matches(event: JournalEvent): boolean {
    if (this.scope !== null && event.scope !== this.scope) return false;
    return pathMatches(this.path, this.recursive, event.path);
  }

  abstract deliver(event: JournalEvent): Promise<DeliveryResult>;

  toString(): string {
    const scope = this.scope === null ? '' : ` [${this.scope}]`;
    return `${this.path} -> ${this.destination.id}${this.recursive ? '' : ' (exact)'}${scope}`;
  }
}

/** Wraps an arbitrary thrown value for a given destination. */
export function toDeliveryFailure(destinationId: string, err: unknown): DeliveryFailure {
  if (err instanceof DeliveryFailure) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new DeliveryFailure(destinationId, `Delivery to '${destinationId}' failed: ${message}`, { cause: err });
}
