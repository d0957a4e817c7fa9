/**
 * A sink that accepts rendered event content.
 *
 * `send` resolves on success and rejects on failure; the timeout policy
 * belongs to the concrete destination. `id` is the stable identity used
 * by the registry and the output store.
 */
export interface Destination {
  readonly id: string;
  readonly kind: string;
  send(content: string): Promise<void>;
}
