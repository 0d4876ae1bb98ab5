// Key domains, boundaries and the key range algebra
export * from './range';

// Expression model, builder and exact evaluation
export * from './expression';

// Range and constant extraction
export * from './extraction';

// Ordered dictionary (bounded index scans)
export * from './collection';

// Sorted data structures
export { SortedMap, type Comparator, type ScanBound, type ScanBounds } from './ds';

// Wire schemas
export * from './schemas';

// Configuration
export * from './config';

// Errors
export {
  KeyRangeError,
  InvalidArgumentError,
  UnsupportedDomainError,
  ExpressionParseError,
} from './errors';

// Utilities
export { compareValues, valuesEqual } from './utils/compare';
export { logger, type Logger } from './utils/logger';
