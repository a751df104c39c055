/**
 * @ringdeque/core - shared foundations for the ringdeque packages
 *
 * - Error handling (DequeError hierarchy, error codes)
 * - Logger interface and stock loggers
 * - Environment-driven configuration
 *
 * **Related packages:**
 * - `@ringdeque/deque` - ring-buffer deque, traversal, sortable adapter
 * - `@ringdeque/testing` - reference model and script runner for tests
 *
 * @module @ringdeque/core
 */

// Error handling
export * from './errors.js'
export * from './error-codes.js'

// Logger
export * from './logger.js'

// Configuration
export * from './config.js'
