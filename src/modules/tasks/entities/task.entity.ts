import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';

/**
 * TypeORM entity for the `tasks` table.
 *
 * Persistence shape only; business rules live in TaskAggregate. Timestamps
 * are written by the aggregate rather than by database defaults, so the
 * values a client sees after a save are the values stored. `owner_id` is a
 * plain integer: users live in an external directory and there is no
 * foreign key.
 */
@Entity('tasks')
export class Task {
  /** UUID assigned by the aggregate at creation */
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Index('idx_tasks_owner_id')
  @Column({ name: 'owner_id', type: 'integer' })
  ownerId!: number;

  @Index('idx_tasks_status')
  @Column({ type: 'varchar', length: 20, default: TaskStatus.PENDING })
  status!: TaskStatus;

  @Column({ type: 'varchar', length: 20, default: TaskPriority.MEDIUM })
  priority!: TaskPriority;

  /** Microsecond precision in PostgreSQL */
  @Index('idx_tasks_created_at')
  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  /** Non-null exactly when status is 'completed' */
  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;
}
