/**
 * Key boundary and key range algebra
 */

export {
  type Orderable,
  type OrderableText,
  isOrderableText,
  numberDomain,
  bigintDomain,
  dateDomain,
  stringDomain,
  createDomain,
} from './Orderable';
export {
  type KeyBoundary,
  type BoundedBoundary,
  type UnboundedBoundary,
  Unbounded,
  createBoundary,
  createPrefixBoundary,
  isBounded,
  compareLowerBoundaries,
  compareUpperBoundaries,
  admits,
  boundariesEqual,
  boundaryToString,
} from './KeyBoundary';
export { KeyRange } from './KeyRange';
