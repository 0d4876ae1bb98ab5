/**
 * Sorted data structures for ordered key scans
 */

export { SortedMap } from './SortedMap';
export { type Comparator, type ScanBound, type ScanBounds } from './types';
