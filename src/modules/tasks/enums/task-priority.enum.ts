/**
 * Priority levels for accounting tasks, lowest to highest.
 *
 * - LOW: can wait until higher priority work is done
 * - MEDIUM: standard close / reconciliation work (default)
 * - HIGH: should be picked up before routine work
 * - URGENT: blocking a filing, payment run or audit request
 */
export enum TaskPriority {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  URGENT = 'urgent',
}

export const DEFAULT_TASK_PRIORITY = TaskPriority.MEDIUM;

const TASK_PRIORITIES: readonly string[] = Object.values(TaskPriority);

export function isTaskPriority(value: unknown): value is TaskPriority {
  return typeof value === 'string' && TASK_PRIORITIES.includes(value);
}
