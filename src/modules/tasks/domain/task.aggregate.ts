import { AggregateRoot } from '@nestjs/cqrs';
import { v4 as uuidv4 } from 'uuid';
import { FieldErrors, ValidationError } from '../../../common/errors/domain.errors';
import { TaskStatus } from '../enums/task-status.enum';
import { DEFAULT_TASK_PRIORITY, TaskPriority, isTaskPriority } from '../enums/task-priority.enum';
import { TASK_TITLE_MAX_LENGTH } from './task.constants';
import { TaskTransition, isTerminalStatus, resolveTransition, transitionRejection } from './task-lifecycle';
import { TaskCreatedEvent } from './events/task-created.event';
import { TaskUpdatedEvent } from './events/task-updated.event';
import { TaskStartedEvent } from './events/task-started.event';
import { TaskCompletedEvent } from './events/task-completed.event';
import { TaskCancelledEvent } from './events/task-cancelled.event';

/** Input accepted when creating a task; values are untrusted */
export interface NewTaskInput {
  title: string;
  description: string;
  ownerId: number;
  /** Defaults to MEDIUM when omitted */
  priority?: string;
}

/** Editable content of an existing task; omitted fields are left unchanged */
export interface TaskContentChanges {
  title?: string;
  description?: string;
}

/** Complete persisted state of a task */
export interface TaskSnapshot {
  id: string;
  title: string;
  description: string;
  ownerId: number;
  status: TaskStatus;
  priority: TaskPriority;
  createdAt: Date;
  updatedAt: Date;
  completedAt: Date | null;
}

function validateTitle(title: string, errors: FieldErrors): string {
  const trimmed = typeof title === 'string' ? title.trim() : '';
  if (trimmed.length === 0) {
    errors.title = 'Task title cannot be empty or whitespace';
  } else if ([...trimmed].length > TASK_TITLE_MAX_LENGTH) {
    // Counted in code points, the unit of the varchar(200) column
    errors.title = `Task title cannot exceed ${TASK_TITLE_MAX_LENGTH} characters`;
  }
  return trimmed;
}

function validateDescription(description: string, errors: FieldErrors): string {
  const trimmed = typeof description === 'string' ? description.trim() : '';
  if (trimmed.length === 0) {
    errors.description = 'Task description cannot be empty or whitespace';
  }
  return trimmed;
}

/**
 * Task aggregate root.
 *
 * The aggregate is the only writer of task state. Construction goes through
 * `create()` (validated, new) or `restore()` (persisted state), so an invalid
 * task is never observable. Status changes go through the lifecycle table in
 * `task-lifecycle.ts`; each mutating method documents which timestamps it
 * touches.
 *
 * Domain events are recorded with `apply()` and published by the command
 * handler after the gateway has saved the task.
 */
export class TaskAggregate extends AggregateRoot {
  private constructor(private state: TaskSnapshot) {
    super();
  }

  /**
   * Validates input and creates a new PENDING task.
   *
   * Fields are checked in the order title, description, ownerId, priority and
   * all failures are reported together.
   *
   * Timestamps: `createdAt` and `updatedAt` are set to `now`; `completedAt` is null.
   *
   * @throws ValidationError with one entry per offending field
   */
  static create(input: NewTaskInput, now: Date = new Date()): TaskAggregate {
    const errors: FieldErrors = {};

    const title = validateTitle(input.title, errors);
    const description = validateDescription(input.description, errors);

    if (!Number.isInteger(input.ownerId) || input.ownerId <= 0) {
      errors.ownerId = 'Owner id must be a positive integer';
    }

    let priority: TaskPriority = DEFAULT_TASK_PRIORITY;
    if (input.priority !== undefined) {
      if (isTaskPriority(input.priority)) {
        priority = input.priority;
      } else {
        errors.priority = `Priority must be one of: ${Object.values(TaskPriority).join(', ')}`;
      }
    }

    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    const task = new TaskAggregate({
      id: uuidv4(),
      title,
      description,
      ownerId: input.ownerId,
      status: TaskStatus.PENDING,
      priority,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
    });
    task.apply(new TaskCreatedEvent(task.state.id, title, input.ownerId, priority));
    return task;
  }

  /** Rehydrates a persisted task. No events are recorded. */
  static restore(snapshot: TaskSnapshot): TaskAggregate {
    return new TaskAggregate({ ...snapshot });
  }

  /**
   * Moves a PENDING task to IN_PROGRESS.
   * Timestamps: `updatedAt` is set to `now`.
   */
  start(now: Date = new Date()): void {
    this.state.status = resolveTransition(this.state.id, this.state.status, TaskTransition.START);
    this.state.updatedAt = now;
    this.apply(new TaskStartedEvent(this.state.id, this.state.ownerId));
  }

  /**
   * Moves a PENDING or IN_PROGRESS task to COMPLETED.
   * Timestamps: `completedAt` and `updatedAt` are set to `now`.
   */
  complete(now: Date = new Date()): void {
    this.state.status = resolveTransition(this.state.id, this.state.status, TaskTransition.COMPLETE);
    this.state.completedAt = now;
    this.state.updatedAt = now;
    this.apply(new TaskCompletedEvent(this.state.id, this.state.ownerId, now));
  }

  /**
   * Moves a PENDING or IN_PROGRESS task to CANCELLED.
   * Timestamps: `updatedAt` is set to `now`.
   */
  cancel(now: Date = new Date()): void {
    const previousStatus = this.state.status;
    this.state.status = resolveTransition(this.state.id, previousStatus, TaskTransition.CANCEL);
    this.state.updatedAt = now;
    this.apply(new TaskCancelledEvent(this.state.id, this.state.ownerId, previousStatus));
  }

  /**
   * Replaces title and/or description on an active task.
   *
   * Supplied fields are validated like on creation; nothing changes if any
   * of them is invalid. Timestamps: `updatedAt` is set to `now`.
   *
   * @throws BusinessRuleViolationError when the task is completed or cancelled
   * @throws ValidationError when a supplied field is empty or too long
   */
  updateContent(changes: TaskContentChanges, now: Date = new Date()): void {
    if (isTerminalStatus(this.state.status)) {
      throw transitionRejection(this.state.id, this.state.status, 'update');
    }

    const errors: FieldErrors = {};
    const title = changes.title !== undefined ? validateTitle(changes.title, errors) : this.state.title;
    const description =
      changes.description !== undefined
        ? validateDescription(changes.description, errors)
        : this.state.description;

    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    this.state.title = title;
    this.state.description = description;
    this.state.updatedAt = now;

    const changedFields: string[] = [];
    if (changes.title !== undefined) changedFields.push('title');
    if (changes.description !== undefined) changedFields.push('description');
    this.apply(new TaskUpdatedEvent(this.state.id, this.state.ownerId, changedFields));
  }

  getId(): string {
    return this.state.id;
  }

  getTitle(): string {
    return this.state.title;
  }

  getDescription(): string {
    return this.state.description;
  }

  getOwnerId(): number {
    return this.state.ownerId;
  }

  getStatus(): TaskStatus {
    return this.state.status;
  }

  getPriority(): TaskPriority {
    return this.state.priority;
  }

  getCreatedAt(): Date {
    return this.state.createdAt;
  }

  getUpdatedAt(): Date {
    return this.state.updatedAt;
  }

  /** Non-null exactly when the status is COMPLETED */
  getCompletedAt(): Date | null {
    return this.state.completedAt;
  }

  isActive(): boolean {
    return !isTerminalStatus(this.state.status);
  }

  /** Copy of the current state for mapping to persistence or API shapes */
  toSnapshot(): TaskSnapshot {
    return { ...this.state };
  }
}
