/** Emitted by `TaskAggregate.start()` when work on a pending task begins */
export class TaskStartedEvent {
  constructor(
    public readonly taskId: string,
    public readonly ownerId: number,
  ) {}

  getEventType(): string {
    return 'TaskStartedEvent';
  }

  getAggregateId(): string {
    return this.taskId;
  }
}
