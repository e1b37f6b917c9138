import { IsInt, IsOptional, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskPriority } from '../enums/task-priority.enum';

/**
 * Request body for POST /tasks.
 *
 * Only types are checked here. Content rules (non-empty after trimming, title
 * length, positive owner id, known priority) belong to the Task aggregate,
 * which reports every failing field in a single VALIDATION_ERROR.
 */
export class CreateTaskDto {
  @ApiProperty({
    example: 'Bank reconciliation',
    description: 'Short title of the task',
    minLength: 1,
    maxLength: 200,
  })
  @IsString()
  title!: string;

  @ApiProperty({
    example: 'Reconcile main checking account',
    description: 'What has to be done',
    minLength: 1,
  })
  @IsString()
  description!: string;

  @ApiProperty({
    example: 1,
    description: 'Directory id of the owning user; must exist and be active',
  })
  @IsInt()
  ownerId!: number;

  @ApiProperty({
    enum: TaskPriority,
    example: TaskPriority.HIGH,
    description: 'Priority level',
    required: false,
    default: TaskPriority.MEDIUM,
  })
  @IsString()
  @IsOptional()
  priority?: string;
}
