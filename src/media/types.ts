/**
 * Media Engine Types
 */

/**
 * Source of media durations consumed by LOAD.
 * Implementations reject when the path cannot be resolved or probed, and
 * when the signal is aborted before the lookup completes.
 */
export interface MediaEngine {
  getDuration(path: string, signal?: AbortSignal): Promise<number>;
}
