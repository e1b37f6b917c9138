/**
 * Lifecycle states of a task.
 *
 * Transitions are governed by `task-lifecycle.ts`:
 * - PENDING → IN_PROGRESS (start)
 * - PENDING / IN_PROGRESS → COMPLETED (complete)
 * - PENDING / IN_PROGRESS → CANCELLED (cancel)
 * - COMPLETED and CANCELLED are terminal
 *
 * Values are persisted as-is in the `status` column.
 */
export enum TaskStatus {
  /** Initial state of every new task */
  PENDING = 'pending',

  /** Work on the task has started */
  IN_PROGRESS = 'in_progress',

  /** Terminal: the task was finished */
  COMPLETED = 'completed',

  /** Terminal: the task will not be done */
  CANCELLED = 'cancelled',
}
