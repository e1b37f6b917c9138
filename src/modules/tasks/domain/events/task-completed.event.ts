/**
 * Domain event emitted when a task reaches the COMPLETED status.
 *
 * Emitted by `TaskAggregate.complete()`; carries the completion timestamp so
 * subscribers do not need to reload the task.
 */
export class TaskCompletedEvent {
  /**
   * @param taskId - Identifier of the completed task
   * @param ownerId - Directory id of the owning user
   * @param completedAt - Moment the task was completed
   */
  constructor(
    public readonly taskId: string,
    public readonly ownerId: number,
    public readonly completedAt: Date,
  ) {}

  getEventType(): string {
    return 'TaskCompletedEvent';
  }

  getAggregateId(): string {
    return this.taskId;
  }
}
