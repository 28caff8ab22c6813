/**
 * Tenant key. `null` addresses the default project.
 */
export type Tenant = string | null;

/**
 * Payloads carried on the change stream.
 */
export type Connected = { type: 'connected' };
export type ParameterValuesChanged = { type: 'parameter_values_changed'; parameters: string[] };

export type Notification = Connected | ParameterValuesChanged;

/**
 * Result of a single detector poll. `topics` is sorted and duplicate-free.
 */
export type Detection = { changed: boolean; topics: readonly string[] };

/**
 * Read side of a tenant datastore, scoped to one poll.
 * Implementations may be synchronous (better-sqlite3) or asynchronous.
 */
export interface ChangeConnection {
  /** Highest change marker currently stored, 0 when there are none. */
  currentChangeMarker(): number | Promise<number>;
  /** Distinct topic names with a marker strictly greater than `marker`, sorted by name. */
  topicsChangedSince(marker: number): readonly string[] | Promise<readonly string[]>;
  close(): void | Promise<void>;
}

/**
 * Opens a connection to one tenant's datastore.
 */
export interface ChangeSource {
  readonly tenant: Tenant;
  open(): ChangeConnection | Promise<ChangeConnection>;
}
