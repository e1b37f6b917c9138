import { TaskAggregate, TaskSnapshot } from '../../src/modules/tasks/domain/task.aggregate';
import { TaskGateway } from '../../src/modules/tasks/domain/task.gateway';
import { TaskStatus } from '../../src/modules/tasks/enums/task-status.enum';

/**
 * TaskGateway kept in a Map. Stores snapshots, so callers never share state
 * with what is stored, the same as with the database. Updates of one task are
 * chained so they run one after another, like a row lock.
 */
export class InMemoryTaskGateway implements TaskGateway {
  private readonly tasks = new Map<string, TaskSnapshot>();

  private readonly rowLocks = new Map<string, Promise<unknown>>();

  readonly saveCalls: string[] = [];

  async save(task: TaskAggregate): Promise<TaskAggregate> {
    const snapshot = task.toSnapshot();
    this.tasks.set(snapshot.id, snapshot);
    this.saveCalls.push(snapshot.id);
    return TaskAggregate.restore(snapshot);
  }

  async findById(id: string): Promise<TaskAggregate | null> {
    const snapshot = this.tasks.get(id);
    return snapshot ? TaskAggregate.restore(snapshot) : null;
  }

  update(id: string, change: (task: TaskAggregate) => void): Promise<TaskAggregate | null> {
    const previous = this.rowLocks.get(id) ?? Promise.resolve();
    const next = previous.then(async () => {
      const snapshot = this.tasks.get(id);
      if (!snapshot) {
        return null;
      }
      const task = TaskAggregate.restore(snapshot);
      change(task);
      this.tasks.set(id, task.toSnapshot());
      this.saveCalls.push(id);
      return task;
    });
    // The next writer waits for this one whether it succeeded or not
    this.rowLocks.set(id, next.then(() => undefined, () => undefined));
    return next;
  }

  async findByOwner(ownerId: number, status?: TaskStatus): Promise<TaskAggregate[]> {
    return [...this.tasks.values()]
      .filter(task => task.ownerId === ownerId && (status === undefined || task.status === status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .map(snapshot => TaskAggregate.restore(snapshot));
  }

  async countActiveByOwner(ownerId: number): Promise<number> {
    return [...this.tasks.values()].filter(
      task => task.ownerId === ownerId && (task.status === TaskStatus.PENDING || task.status === TaskStatus.IN_PROGRESS),
    ).length;
  }

  /** Puts a task straight into the store, bypassing the use cases */
  seed(snapshot: TaskSnapshot): void {
    this.tasks.set(snapshot.id, { ...snapshot });
  }

  size(): number {
    return this.tasks.size;
  }
}
