/**
 * Persisted output tuple. One row per (destination_id, path).
 */
export interface OutputRecord {
  readonly scope: string | null;
  readonly destination_id: string;
  readonly path: string;
  readonly recursive: boolean;
}

/**
 * Persistence collaborator for output configuration.
 *
 * The router never touches the store; administrative use cases own the
 * transaction boundaries.
 */
export interface OutputStore {
  /** All outputs, or only those of `scope` when given (`null` = global). */
  listOutputs(scope?: string | null): Promise<OutputRecord[]>;
  findOutput(destinationId: string, path: string): Promise<OutputRecord | undefined>;
  addOutput(record: OutputRecord): Promise<void>;
  updateOutput(record: OutputRecord): Promise<void>;
  /** Returns false when nothing matched. */
  deleteOutput(destinationId: string, path: string): Promise<boolean>;
  transaction<T>(work: (store: OutputStore) => Promise<T>): Promise<T>;
}
