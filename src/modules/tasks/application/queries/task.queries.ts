import { TaskStatus } from '../../enums/task-status.enum';

/**
 * Query for a single task by id.
 * The handler fails with TASK_NOT_FOUND instead of returning null.
 */
export class GetTaskByIdQuery {
  constructor(public readonly id: string) {}
}

/**
 * Query for every task owned by one directory user, oldest first.
 *
 * @remarks
 * - The owner must exist in the directory (active or not)
 * - An owner without tasks yields an empty list
 */
export class ListTasksByUserQuery {
  /**
   * @param ownerId - Directory id of the owning user
   * @param status - Optional status filter
   */
  constructor(
    public readonly ownerId: number,
    public readonly status?: TaskStatus,
  ) {}
}
