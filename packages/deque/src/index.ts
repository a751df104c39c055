/**
 * @ringdeque/deque - double-ended queue over a circular array
 *
 * Provides the Deque container, its ring layout helpers, lazy traversal,
 * debug formatting and a sortable view with an in-place sort.
 *
 * @module @ringdeque/deque
 *
 * @example Basic usage
 * ```typescript
 * import { Deque, sortDeque } from '@ringdeque/deque';
 *
 * const deque = Deque.of(9, 8, 7, 6);
 * sortDeque(deque);
 *
 * for (let i = 5; i > 0; i--) {
 *   deque.pushFront(i);
 * }
 *
 * for (const [index, value] of deque.reversed()) {
 *   console.log(index, value);
 * }
 * ```
 */

// Container
export { Deque } from './deque.js';

// Types
export {
  type Lookup,
  type DequeOptions,
  type IndexedSource,
  NOT_FOUND,
  found,
} from './types.js';

// Options validation
export {
  type DequeOptionsSchemaType,
  DequeOptionsSchema,
  parseDequeOptions,
} from './schema.js';

// Capacity and layout
export { MAX_CAPACITY, GROWTH_THRESHOLD, nextCapacity } from './capacity.js';
export { type Run, type FrontBack, frontBack, physicalIndex, linearize } from './layout.js';

// Traversal
export { forward, backward, restartable } from './iter.js';

// Formatting
export { formatDeque, formatValue } from './format.js';

// Sorting
export {
  type Less,
  type Ordered,
  type SortableSequence,
  SortableDeque,
  naturalLess,
  sortable,
  sortableBy,
  reverseOrder,
} from './sortable.js';
export { sort, isSorted, sortDeque, sortDequeBy } from './sort.js';
