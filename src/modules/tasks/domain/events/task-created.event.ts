import { TaskPriority } from '../../enums/task-priority.enum';

/**
 * Domain event emitted when a new task is created.
 *
 * Recorded by `TaskAggregate.create()` and published once the task has been
 * persisted, so subscribers never observe a task that failed to save.
 */
export class TaskCreatedEvent {
  /**
   * @param taskId - Identifier of the created task
   * @param title - Title at creation time, for notifications
   * @param ownerId - Directory id of the owning user
   * @param priority - Priority the task was created with
   */
  constructor(
    public readonly taskId: string,
    public readonly title: string,
    public readonly ownerId: number,
    public readonly priority: TaskPriority,
  ) {}

  getEventType(): string {
    return 'TaskCreatedEvent';
  }

  getAggregateId(): string {
    return this.taskId;
  }
}
