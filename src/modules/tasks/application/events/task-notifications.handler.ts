import { Logger } from '@nestjs/common';
import { EventsHandler, IEventHandler } from '@nestjs/cqrs';
import { TaskCreatedEvent } from '../../domain/events/task-created.event';
import { TaskStartedEvent } from '../../domain/events/task-started.event';
import { TaskCompletedEvent } from '../../domain/events/task-completed.event';
import { TaskCancelledEvent } from '../../domain/events/task-cancelled.event';
import { TaskUpdatedEvent } from '../../domain/events/task-updated.event';

export type TaskLifecycleEvent =
  | TaskCreatedEvent
  | TaskStartedEvent
  | TaskCompletedEvent
  | TaskCancelledEvent
  | TaskUpdatedEvent;

/**
 * Writes a notification line for every published task event.
 * This is the only subscriber; there is no external message bus.
 */
@EventsHandler(TaskCreatedEvent, TaskStartedEvent, TaskCompletedEvent, TaskCancelledEvent, TaskUpdatedEvent)
export class TaskNotificationsHandler implements IEventHandler<TaskLifecycleEvent> {
  private readonly logger = new Logger(TaskNotificationsHandler.name);

  handle(event: TaskLifecycleEvent): void {
    this.logger.log(`[EVENT] ${event.getEventType()}: ${this.describe(event)}`);
  }

  private describe(event: TaskLifecycleEvent): string {
    if (event instanceof TaskCreatedEvent) {
      return `task_id=${event.taskId}, owner_id=${event.ownerId}, priority=${event.priority}`;
    }
    if (event instanceof TaskCompletedEvent) {
      return `task_id=${event.taskId}, owner_id=${event.ownerId}, completed_at=${event.completedAt.toISOString()}`;
    }
    if (event instanceof TaskCancelledEvent) {
      return `task_id=${event.taskId}, owner_id=${event.ownerId}, previous_status=${event.previousStatus}`;
    }
    if (event instanceof TaskUpdatedEvent) {
      return `task_id=${event.taskId}, owner_id=${event.ownerId}, fields=${event.changedFields.join(',')}`;
    }
    return `task_id=${event.taskId}, owner_id=${event.ownerId}`;
  }
}
