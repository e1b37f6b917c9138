import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, In, Repository } from 'typeorm';
import { Task } from '../entities/task.entity';
import { TaskAggregate } from '../domain/task.aggregate';
import { TaskGateway } from '../domain/task.gateway';
import { TaskStatus } from '../enums/task-status.enum';
import { DatabaseError, isDomainError } from '../../../common/errors/domain.errors';
import { ErrorCode } from '../../../common/errors/error-codes';
import { errorMessage } from '../../../common/utils/error.utils';

/** Driver error codes that mean the database could not be reached */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  // PostgreSQL admin_shutdown, crash_shutdown, cannot_connect_now
  '57P01',
  '57P02',
  '57P03',
]);

/**
 * Wraps a raw TypeORM / pg failure in a DatabaseError so no driver detail
 * crosses the gateway boundary.
 */
export function toDatabaseError(error: unknown): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }
  const code =
    typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  return new DatabaseError(
    code !== undefined && CONNECTION_ERROR_CODES.has(code) ? ErrorCode.CONNECTION_ERROR : ErrorCode.DATABASE_ERROR,
    error,
  );
}

/**
 * PostgreSQL implementation of the TaskGateway, backed by TypeORM.
 *
 * Writes run inside a transaction; reads never use the query cache so
 * lifecycle checks always see the stored status. Changes to an existing task
 * hold a `SELECT ... FOR UPDATE` lock on its row until they are saved.
 */
@Injectable()
export class TaskRepository implements TaskGateway {
  private readonly logger = new Logger(TaskRepository.name);

  constructor(
    @InjectRepository(Task)
    private readonly taskRepository: Repository<Task>,
    private readonly dataSource: DataSource,
  ) {}

  async save(taskAggregate: TaskAggregate): Promise<TaskAggregate> {
    const task = this.mapAggregateToEntity(taskAggregate);
    try {
      const saved = await this.dataSource.transaction(entityManager => entityManager.save(Task, task));
      this.logger.debug(`Task saved: ${saved.id} (${saved.status})`);
      return this.mapEntityToAggregate(saved);
    } catch (error) {
      this.logger.error(`Failed to save task ${task.id}: ${errorMessage(error)}`);
      throw toDatabaseError(error);
    }
  }

  async findById(id: string): Promise<TaskAggregate | null> {
    try {
      const task = await this.taskRepository
        .createQueryBuilder('task')
        .where('task.id = :id', { id })
        .cache(false)
        .getOne();

      return task ? this.mapEntityToAggregate(task) : null;
    } catch (error) {
      this.logger.error(`Failed to find task ${id}: ${errorMessage(error)}`);
      throw toDatabaseError(error);
    }
  }

  async update(id: string, change: (task: TaskAggregate) => void): Promise<TaskAggregate | null> {
    try {
      return await this.dataSource.transaction(async entityManager => {
        const found = await entityManager.findOne(Task, {
          where: { id },
          lock: { mode: 'pessimistic_write' },
        });
        if (!found) {
          return null;
        }

        const task = this.mapEntityToAggregate(found);
        change(task);
        await entityManager.save(Task, this.mapAggregateToEntity(task));
        this.logger.debug(`Task updated: ${id} (${task.getStatus()})`);
        return task;
      });
    } catch (error) {
      if (isDomainError(error)) {
        throw error;
      }
      this.logger.error(`Failed to update task ${id}: ${errorMessage(error)}`);
      throw toDatabaseError(error);
    }
  }

  async findByOwner(ownerId: number, status?: TaskStatus): Promise<TaskAggregate[]> {
    const where: FindOptionsWhere<Task> = { ownerId };
    if (status) {
      where.status = status;
    }

    try {
      const tasks = await this.taskRepository.find({
        where,
        order: { createdAt: 'ASC', id: 'ASC' },
      });
      this.logger.debug(`Found ${tasks.length} tasks for owner ${ownerId}`);
      return tasks.map(task => this.mapEntityToAggregate(task));
    } catch (error) {
      this.logger.error(`Failed to list tasks for owner ${ownerId}: ${errorMessage(error)}`);
      throw toDatabaseError(error);
    }
  }

  async countActiveByOwner(ownerId: number): Promise<number> {
    try {
      return await this.taskRepository.count({
        where: { ownerId, status: In([TaskStatus.PENDING, TaskStatus.IN_PROGRESS]) },
      });
    } catch (error) {
      this.logger.error(`Failed to count tasks for owner ${ownerId}: ${errorMessage(error)}`);
      throw toDatabaseError(error);
    }
  }

  private mapAggregateToEntity(taskAggregate: TaskAggregate): Task {
    const snapshot = taskAggregate.toSnapshot();
    const task = new Task();
    task.id = snapshot.id;
    task.title = snapshot.title;
    task.description = snapshot.description;
    task.ownerId = snapshot.ownerId;
    task.status = snapshot.status;
    task.priority = snapshot.priority;
    task.createdAt = snapshot.createdAt;
    task.updatedAt = snapshot.updatedAt;
    task.completedAt = snapshot.completedAt;
    return task;
  }

  private mapEntityToAggregate(task: Task): TaskAggregate {
    return TaskAggregate.restore({
      id: task.id,
      title: task.title,
      description: task.description,
      ownerId: task.ownerId,
      status: task.status,
      priority: task.priority,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
      completedAt: task.completedAt,
    });
  }
}
