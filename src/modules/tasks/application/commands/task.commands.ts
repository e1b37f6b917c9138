/**
 * Command to create a new task for a directory user.
 *
 * Values are passed through untouched; the Task aggregate validates them and
 * reports every invalid field at once.
 */
export class CreateTaskCommand {
  /**
   * @param title - Task title (non-empty, at most 200 characters)
   * @param description - Task description (non-empty)
   * @param ownerId - Directory id of the owning user; must exist and be active
   * @param priority - Optional priority, MEDIUM when omitted
   */
  constructor(
    public readonly title: string,
    public readonly description: string,
    public readonly ownerId: number,
    public readonly priority?: string,
  ) {}
}

/**
 * Command to mark a task as completed.
 * Fails with TASK_ALREADY_COMPLETED when repeated on the same task.
 */
export class CompleteTaskCommand {
  constructor(public readonly id: string) {}
}

/** Command to move a pending task to IN_PROGRESS */
export class StartTaskCommand {
  constructor(public readonly id: string) {}
}

/** Command to cancel a pending or in-progress task */
export class CancelTaskCommand {
  constructor(public readonly id: string) {}
}

/**
 * Command to edit the title and/or description of an active task.
 * Undefined fields are left unchanged.
 */
export class UpdateTaskContentCommand {
  constructor(
    public readonly id: string,
    public readonly title?: string,
    public readonly description?: string,
  ) {}
}
