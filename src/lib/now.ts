/**
 * Time helper: read the clock on every call, never at module load,
 * since the server process outlives any single request.
 */

/** Epoch milliseconds for stored timestamps */
export const nowMs = (): number => Date.now();
