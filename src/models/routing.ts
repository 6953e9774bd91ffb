// Routing edges

/**
 * "Work meant for `source` goes to `target` instead"
 */
export interface RoutingEntry {
  source: string;
  target: string;
}

/**
 * Used only when the resolved target of `name` is not live
 */
export interface FallbackEntry {
  name: string;
  fallback: string;
}

/**
 * Resolution result with the path that was followed
 */
export interface Resolution {
  requested: string;
  resolved: string;
  path: string[];
  cycleDetected: boolean;
  usedFallback: boolean;
}
