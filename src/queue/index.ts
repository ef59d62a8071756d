/**
 * Queue Module
 */

export { DelayQueue, type Delayed, type DelayQueueOptions } from './delay-queue.js';
