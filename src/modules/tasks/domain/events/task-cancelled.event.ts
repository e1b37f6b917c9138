import { TaskStatus } from '../../enums/task-status.enum';

/** Emitted by `TaskAggregate.cancel()`; records the status the task left */
export class TaskCancelledEvent {
  constructor(
    public readonly taskId: string,
    public readonly ownerId: number,
    public readonly previousStatus: TaskStatus,
  ) {}

  getEventType(): string {
    return 'TaskCancelledEvent';
  }

  getAggregateId(): string {
    return this.taskId;
  }
}
