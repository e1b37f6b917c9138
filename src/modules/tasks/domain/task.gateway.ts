import { TaskStatus } from '../enums/task-status.enum';
import { TaskAggregate } from './task.aggregate';

/** Injection token for the TaskGateway implementation */
export const TASK_GATEWAY = Symbol('TASK_GATEWAY');

/**
 * Persistence contract consumed by the task use cases.
 *
 * Implementations must make each call transactional and must never return a
 * partially written task. Infrastructure failures are reported as
 * `DatabaseError`; driver errors must not escape.
 */
export interface TaskGateway {
  /**
   * Inserts a new task and returns it as persisted.
   * @throws DatabaseError if the write fails
   */
  save(task: TaskAggregate): Promise<TaskAggregate>;

  /**
   * Loads a task from the store, bypassing any cache.
   * @returns The task, or null if no task has this id
   */
  findById(id: string): Promise<TaskAggregate | null>;

  /**
   * Loads the task under a row lock, applies `change` and saves the result,
   * all in one transaction. Updates of the same task are serialised, so
   * `change` always sees what the previous writer stored.
   *
   * @returns The changed task with its recorded events, or null if no task has this id
   * @throws whatever `change` throws; nothing is written in that case
   */
  update(id: string, change: (task: TaskAggregate) => void): Promise<TaskAggregate | null>;

  /**
   * Tasks owned by `ownerId`, ordered by creation time ascending (ties by id).
   * @param status - Optional status filter
   */
  findByOwner(ownerId: number, status?: TaskStatus): Promise<TaskAggregate[]>;

  /** Number of PENDING or IN_PROGRESS tasks owned by `ownerId` */
  countActiveByOwner(ownerId: number): Promise<number>;
}
