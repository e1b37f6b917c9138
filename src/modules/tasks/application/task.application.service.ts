import { Injectable, Logger } from '@nestjs/common';
import { CommandBus, QueryBus } from '@nestjs/cqrs';
import {
  CancelTaskCommand,
  CompleteTaskCommand,
  CreateTaskCommand,
  StartTaskCommand,
  UpdateTaskContentCommand,
} from './commands/task.commands';
import { GetTaskByIdQuery, ListTasksByUserQuery } from './queries/task.queries';
import { TaskAggregate } from '../domain/task.aggregate';
import { CreateTaskDto } from '../dto/create-task.dto';
import { UpdateTaskDto } from '../dto/update-task.dto';
import { TaskStatus } from '../enums/task-status.enum';

/**
 * Application service for task operations.
 *
 * Entry point used by the HTTP layer: translates request DTOs into commands
 * and queries and dispatches them through the CQRS buses. Domain errors pass
 * through untouched; the global exception filter maps them.
 */
@Injectable()
export class TaskApplicationService {
  private readonly logger = new Logger(TaskApplicationService.name);

  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
  ) {}

  /** create_task(title, description, ownerId, priority?) */
  async createTask(dto: CreateTaskDto): Promise<TaskAggregate> {
    this.logger.debug(`Creating task for owner ${dto.ownerId}`);
    return this.commandBus.execute<CreateTaskCommand, TaskAggregate>(
      new CreateTaskCommand(dto.title, dto.description, dto.ownerId, dto.priority),
    );
  }

  /** complete_task(taskId) */
  async completeTask(id: string): Promise<TaskAggregate> {
    this.logger.debug(`Completing task: ${id}`);
    return this.commandBus.execute<CompleteTaskCommand, TaskAggregate>(new CompleteTaskCommand(id));
  }

  async startTask(id: string): Promise<TaskAggregate> {
    this.logger.debug(`Starting task: ${id}`);
    return this.commandBus.execute<StartTaskCommand, TaskAggregate>(new StartTaskCommand(id));
  }

  async cancelTask(id: string): Promise<TaskAggregate> {
    this.logger.debug(`Cancelling task: ${id}`);
    return this.commandBus.execute<CancelTaskCommand, TaskAggregate>(new CancelTaskCommand(id));
  }

  async updateTask(id: string, dto: UpdateTaskDto): Promise<TaskAggregate> {
    this.logger.debug(`Updating task: ${id}`);
    return this.commandBus.execute<UpdateTaskContentCommand, TaskAggregate>(
      new UpdateTaskContentCommand(id, dto.title, dto.description),
    );
  }

  async getTaskById(id: string): Promise<TaskAggregate> {
    return this.queryBus.execute<GetTaskByIdQuery, TaskAggregate>(new GetTaskByIdQuery(id));
  }

  /** list_tasks_by_user(ownerId) */
  async listTasksByUser(ownerId: number, status?: TaskStatus): Promise<TaskAggregate[]> {
    this.logger.debug(`Listing tasks for owner ${ownerId}${status ? ` with status ${status}` : ''}`);
    return this.queryBus.execute<ListTasksByUserQuery, TaskAggregate[]>(new ListTasksByUserQuery(ownerId, status));
  }
}
