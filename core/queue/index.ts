/**
 * headsync Queue
 *
 * Serialized execution and tracking of asynchronous work.
 */

export { TaskQueue, type QueuedOperation } from './taskQueue'
export { TaskTracker } from './taskTracker'
