/**
 * Domain event emitted when a task's title or description changes.
 * Emitted by `TaskAggregate.updateContent()`.
 */
export class TaskUpdatedEvent {
  /**
   * @param taskId - Identifier of the updated task
   * @param ownerId - Directory id of the owning user
   * @param changedFields - Names of the fields that were supplied
   */
  constructor(
    public readonly taskId: string,
    public readonly ownerId: number,
    public readonly changedFields: string[],
  ) {}

  getEventType(): string {
    return 'TaskUpdatedEvent';
  }

  getAggregateId(): string {
    return this.taskId;
  }
}
