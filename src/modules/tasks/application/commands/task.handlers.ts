import { Inject, Logger } from '@nestjs/common';
import { CommandHandler, EventPublisher, ICommandHandler } from '@nestjs/cqrs';
import {
  CancelTaskCommand,
  CompleteTaskCommand,
  CreateTaskCommand,
  StartTaskCommand,
  UpdateTaskContentCommand,
} from './task.commands';
import { TaskAggregate } from '../../domain/task.aggregate';
import { TASK_GATEWAY, TaskGateway } from '../../domain/task.gateway';
import { USER_EXISTENCE_CHECK, UserExistenceCheck } from '../../domain/user-existence-check';
import { MAX_ACTIVE_TASKS_PER_OWNER } from '../../domain/task.constants';
import { BusinessRuleViolationError, ResourceNotFoundError } from '../../../../common/errors/domain.errors';
import { ErrorCode } from '../../../../common/errors/error-codes';
import { errorMessage, errorStack, isExpectedFailure } from '../../../../common/utils/error.utils';

function logFailure(logger: Logger, message: string, error: unknown): void {
  if (isExpectedFailure(error)) {
    logger.warn(`${message}: ${errorMessage(error)}`);
  } else {
    logger.error(`${message}: ${errorMessage(error)}`, errorStack(error));
  }
}

/**
 * Use case: create a task for a directory user.
 *
 * Steps:
 * 1. The owner must exist and be active (USER_NOT_FOUND otherwise)
 * 2. The owner must hold fewer than MAX_ACTIVE_TASKS_PER_OWNER active tasks
 * 3. The aggregate validates every field (ValidationError)
 * 4. The gateway persists the task, then its events are published
 *
 * Nothing is written when any step before 4 fails.
 */
@CommandHandler(CreateTaskCommand)
export class CreateTaskHandler implements ICommandHandler<CreateTaskCommand, TaskAggregate> {
  private readonly logger = new Logger(CreateTaskHandler.name);

  constructor(
    @Inject(TASK_GATEWAY) private readonly taskGateway: TaskGateway,
    @Inject(USER_EXISTENCE_CHECK) private readonly users: UserExistenceCheck,
    private readonly publisher: EventPublisher,
  ) {}

  async execute(command: CreateTaskCommand): Promise<TaskAggregate> {
    try {
      if (!(await this.users.existsAndActive(command.ownerId))) {
        throw ResourceNotFoundError.user(command.ownerId);
      }

      const activeTasks = await this.taskGateway.countActiveByOwner(command.ownerId);
      if (activeTasks >= MAX_ACTIVE_TASKS_PER_OWNER) {
        throw new BusinessRuleViolationError(
          ErrorCode.MAX_TASKS_EXCEEDED,
          `User ${command.ownerId} has reached the maximum of ${MAX_ACTIVE_TASKS_PER_OWNER} active tasks`,
          { owner_id: command.ownerId, current_count: activeTasks, max_allowed: MAX_ACTIVE_TASKS_PER_OWNER },
        );
      }

      const task = this.publisher.mergeObjectContext(
        TaskAggregate.create({
          title: command.title,
          description: command.description,
          ownerId: command.ownerId,
          priority: command.priority,
        }),
      );

      const saved = await this.taskGateway.save(task);
      task.commit();

      this.logger.log(`Task created: ${saved.getId()} (owner ${saved.getOwnerId()})`);
      return saved;
    } catch (error) {
      logFailure(this.logger, `Failed to create task for owner ${command.ownerId}`, error);
      throw error;
    }
  }
}

/**
 * Shared flow for use cases that change one existing task.
 *
 * The gateway reads the task under a row lock and saves it in the same
 * transaction, so lifecycle rules are checked against the stored status and
 * two concurrent calls cannot both pass the same check. Events are published
 * only after the transaction has committed.
 */
abstract class TaskMutationHandler<TCommand extends { id: string }> implements ICommandHandler<TCommand, TaskAggregate> {
  protected abstract readonly logger: Logger;

  /** Verb used in log lines, e.g. "complete" */
  protected abstract readonly operation: string;

  protected constructor(
    private readonly taskGateway: TaskGateway,
    private readonly publisher: EventPublisher,
  ) {}

  /** Applies the domain operation; throws to abort without saving */
  protected abstract mutate(task: TaskAggregate, command: TCommand): void;

  async execute(command: TCommand): Promise<TaskAggregate> {
    try {
      const changed = await this.taskGateway.update(command.id, task => this.mutate(task, command));
      if (!changed) {
        throw ResourceNotFoundError.task(command.id);
      }

      this.publisher.mergeObjectContext(changed).commit();

      this.logger.log(`Task ${this.operation} succeeded: ${command.id}`);
      return changed;
    } catch (error) {
      logFailure(this.logger, `Failed to ${this.operation} task ${command.id}`, error);
      throw error;
    }
  }
}

/** Use case: complete a pending or in-progress task */
@CommandHandler(CompleteTaskCommand)
export class CompleteTaskHandler extends TaskMutationHandler<CompleteTaskCommand> {
  protected readonly logger = new Logger(CompleteTaskHandler.name);
  protected readonly operation = 'complete';

  constructor(@Inject(TASK_GATEWAY) taskGateway: TaskGateway, publisher: EventPublisher) {
    super(taskGateway, publisher);
  }

  protected mutate(task: TaskAggregate): void {
    task.complete();
  }
}

/** Use case: start work on a pending task */
@CommandHandler(StartTaskCommand)
export class StartTaskHandler extends TaskMutationHandler<StartTaskCommand> {
  protected readonly logger = new Logger(StartTaskHandler.name);
  protected readonly operation = 'start';

  constructor(@Inject(TASK_GATEWAY) taskGateway: TaskGateway, publisher: EventPublisher) {
    super(taskGateway, publisher);
  }

  protected mutate(task: TaskAggregate): void {
    task.start();
  }
}

/** Use case: cancel a pending or in-progress task */
@CommandHandler(CancelTaskCommand)
export class CancelTaskHandler extends TaskMutationHandler<CancelTaskCommand> {
  protected readonly logger = new Logger(CancelTaskHandler.name);
  protected readonly operation = 'cancel';

  constructor(@Inject(TASK_GATEWAY) taskGateway: TaskGateway, publisher: EventPublisher) {
    super(taskGateway, publisher);
  }

  protected mutate(task: TaskAggregate): void {
    task.cancel();
  }
}

/** Use case: edit the title and/or description of an active task */
@CommandHandler(UpdateTaskContentCommand)
export class UpdateTaskContentHandler extends TaskMutationHandler<UpdateTaskContentCommand> {
  protected readonly logger = new Logger(UpdateTaskContentHandler.name);
  protected readonly operation = 'update';

  constructor(@Inject(TASK_GATEWAY) taskGateway: TaskGateway, publisher: EventPublisher) {
    super(taskGateway, publisher);
  }

  protected mutate(task: TaskAggregate, command: UpdateTaskContentCommand): void {
    task.updateContent({ title: command.title, description: command.description });
  }
}
