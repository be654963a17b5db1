/**
 * Location selection errors
 */

/**
 * Invalid tiers, catalog or keyword data. Raised at load/construction time.
 */
export class LocationConfigError extends Error {
  code: string;

  constructor(message: string) {
    super(message);
    this.name = 'LocationConfigError';
    this.code = 'LOCATION_CONFIG_INVALID';
  }
}

/**
 * The caller abandoned the selection; no target was produced.
 */
export class SelectionCancelledError extends Error {
  code: string;

  constructor(message: string = 'Location selection was cancelled') {
    super(message);
    this.name = 'SelectionCancelledError';
    this.code = 'SELECTION_CANCELLED';
  }
}

export function isSelectionCancelled(error: unknown): error is SelectionCancelledError {
  return error instanceof SelectionCancelledError;
}
