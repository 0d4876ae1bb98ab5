/**
 * Common types for sorted data structures
 */

/**
 * Comparator function for ordering keys
 */
export type Comparator<K> = (a: K, b: K) => number;

/**
 * One end of a scan: a seek key and whether it is part of the scan.
 * An omitted end means the start or the end of the map.
 */
export interface ScanBound<K> {
  key: K;
  inclusive: boolean;
}

/**
 * Options for bounded scans
 */
export interface ScanBounds<K> {
  /** Lower end (default: the smallest key) */
  from?: ScanBound<K>;
  /** Upper end (default: the largest key) */
  to?: ScanBound<K>;
  /** Iterate from `to` down to `from` (default: false) */
  reverse?: boolean;
}
