/**
 * Task tracking module.
 * @module tasks
 */

export { TasksService } from './service.js';
export { TaskPoller, PollSchedule, sleep, type TaskSource, type WaitOptions, type Clock } from './poller.js';
export {
  buildTaskFilterParams,
  buildTaskQueryParams,
  isEmptyFilter,
  type TaskFilter,
  type TaskQuery,
} from './params.js';
