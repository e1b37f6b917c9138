/** Field limits enforced by the Task aggregate */
export const TASK_TITLE_MAX_LENGTH = 200;

/** Pending + in-progress tasks a single owner may hold at once */
export const MAX_ACTIVE_TASKS_PER_OWNER = 1000;
