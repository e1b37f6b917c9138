import { Inject, Logger } from '@nestjs/common';
import { IQueryHandler, QueryHandler } from '@nestjs/cqrs';
import { GetTaskByIdQuery, ListTasksByUserQuery } from './task.queries';
import { TaskAggregate } from '../../domain/task.aggregate';
import { TASK_GATEWAY, TaskGateway } from '../../domain/task.gateway';
import { USER_EXISTENCE_CHECK, UserExistenceCheck } from '../../domain/user-existence-check';
import { ResourceNotFoundError } from '../../../../common/errors/domain.errors';

/**
 * Query handler for a single task.
 * Read-only; throws TASK_NOT_FOUND rather than returning null so the HTTP
 * boundary maps it like any other domain error.
 */
@QueryHandler(GetTaskByIdQuery)
export class GetTaskByIdHandler implements IQueryHandler<GetTaskByIdQuery, TaskAggregate> {
  constructor(@Inject(TASK_GATEWAY) private readonly taskGateway: TaskGateway) {}

  async execute(query: GetTaskByIdQuery): Promise<TaskAggregate> {
    const task = await this.taskGateway.findById(query.id);
    if (!task) {
      throw ResourceNotFoundError.task(query.id);
    }
    return task;
  }
}

/**
 * Use case: list the tasks of one owner.
 *
 * The owner is checked against the directory first so that a typo in the id
 * is reported as USER_NOT_FOUND instead of an empty list. Inactive owners
 * still see their tasks. Ordering comes from the gateway: `createdAt`
 * ascending, ties broken by id.
 */
@QueryHandler(ListTasksByUserQuery)
export class ListTasksByUserHandler implements IQueryHandler<ListTasksByUserQuery, TaskAggregate[]> {
  private readonly logger = new Logger(ListTasksByUserHandler.name);

  constructor(
    @Inject(TASK_GATEWAY) private readonly taskGateway: TaskGateway,
    @Inject(USER_EXISTENCE_CHECK) private readonly users: UserExistenceCheck,
  ) {}

  async execute(query: ListTasksByUserQuery): Promise<TaskAggregate[]> {
    if (!(await this.users.exists(query.ownerId))) {
      this.logger.warn(`Listing tasks for unknown owner ${query.ownerId}`);
      throw ResourceNotFoundError.user(query.ownerId);
    }

    const tasks = await this.taskGateway.findByOwner(query.ownerId, query.status);
    this.logger.debug(`Found ${tasks.length} tasks for owner ${query.ownerId}`);
    return tasks;
  }
}
