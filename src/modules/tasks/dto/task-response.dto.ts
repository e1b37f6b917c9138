import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskAggregate } from '../domain/task.aggregate';

/**
 * Task representation returned by every task endpoint.
 * Timestamps serialise as ISO 8601 strings.
 */
export class TaskResponseDto {
  @ApiProperty({ example: '123e4567-e89b-42d3-a456-426614174000' })
  id!: string;

  @ApiProperty({ example: 'Bank reconciliation' })
  title!: string;

  @ApiProperty({ example: 'Reconcile main checking account' })
  description!: string;

  @ApiProperty({ example: 1, description: 'Directory id of the owning user' })
  ownerId!: number;

  @ApiProperty({ enum: TaskStatus, example: TaskStatus.PENDING })
  status!: TaskStatus;

  @ApiProperty({ enum: TaskPriority, example: TaskPriority.MEDIUM })
  priority!: TaskPriority;

  @ApiProperty({ example: '2024-03-01T09:00:00.000Z' })
  createdAt!: Date;

  @ApiProperty({ example: '2024-03-01T09:00:00.000Z' })
  updatedAt!: Date;

  @ApiProperty({
    example: null,
    nullable: true,
    type: Date,
    description: 'Set once the task is completed, null otherwise',
  })
  completedAt!: Date | null;

  static fromAggregate(task: TaskAggregate): TaskResponseDto {
    const dto = new TaskResponseDto();
    const snapshot = task.toSnapshot();
    dto.id = snapshot.id;
    dto.title = snapshot.title;
    dto.description = snapshot.description;
    dto.ownerId = snapshot.ownerId;
    dto.status = snapshot.status;
    dto.priority = snapshot.priority;
    dto.createdAt = snapshot.createdAt;
    dto.updatedAt = snapshot.updatedAt;
    dto.completedAt = snapshot.completedAt;
    return dto;
  }
}
