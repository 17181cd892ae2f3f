export { TaskQueue, type QueueStatus, type QueuedTask, type TaskHandler } from './task-queue.js';
