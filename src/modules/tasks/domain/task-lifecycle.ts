import { BusinessRuleViolationError } from '../../../common/errors/domain.errors';
import { ErrorCode } from '../../../common/errors/error-codes';
import { TaskStatus } from '../enums/task-status.enum';

/** Triggers that move a task between statuses */
export enum TaskTransition {
  START = 'start',
  COMPLETE = 'complete',
  CANCEL = 'cancel',
}

/**
 * Legal transitions per status. A transition missing from a row is rejected.
 * Terminal statuses have empty rows.
 */
const TRANSITIONS: Record<TaskStatus, Partial<Record<TaskTransition, TaskStatus>>> = {
  [TaskStatus.PENDING]: {
    [TaskTransition.START]: TaskStatus.IN_PROGRESS,
    [TaskTransition.COMPLETE]: TaskStatus.COMPLETED,
    [TaskTransition.CANCEL]: TaskStatus.CANCELLED,
  },
  [TaskStatus.IN_PROGRESS]: {
    [TaskTransition.COMPLETE]: TaskStatus.COMPLETED,
    [TaskTransition.CANCEL]: TaskStatus.CANCELLED,
  },
  [TaskStatus.COMPLETED]: {},
  [TaskStatus.CANCELLED]: {},
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === TaskStatus.COMPLETED || status === TaskStatus.CANCELLED;
}

/**
 * Rejection for an operation attempted on a task in `current` status.
 * Terminal statuses get their own codes so clients can tell
 * "already completed" from "already cancelled" from a plain invalid move.
 */
export function transitionRejection(
  taskId: string,
  current: TaskStatus,
  attempted: string,
): BusinessRuleViolationError {
  const details = { task_id: taskId, current_status: current, attempted_operation: attempted };

  switch (current) {
    case TaskStatus.COMPLETED:
      return new BusinessRuleViolationError(
        ErrorCode.TASK_ALREADY_COMPLETED,
        `Cannot ${attempted} task ${taskId}: task is already completed`,
        details,
      );
    case TaskStatus.CANCELLED:
      return new BusinessRuleViolationError(
        ErrorCode.TASK_ALREADY_CANCELLED,
        `Cannot ${attempted} task ${taskId}: task is already cancelled`,
        details,
      );
    default:
      return new BusinessRuleViolationError(
        ErrorCode.INVALID_STATE_TRANSITION,
        `Cannot ${attempted} task ${taskId} from '${current}'`,
        details,
      );
  }
}

/**
 * Resolves the status a task moves to when `transition` is applied.
 * @throws BusinessRuleViolationError when the table has no such transition
 */
export function resolveTransition(taskId: string, current: TaskStatus, transition: TaskTransition): TaskStatus {
  const next = TRANSITIONS[current][transition];
  if (next === undefined) {
    throw transitionRejection(taskId, current, transition);
  }
  return next;
}
