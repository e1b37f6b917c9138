import { IsEnum, IsInt, IsOptional, IsUUID, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';

/** Query string of GET /tasks */
export class TaskFilterDto {
  @ApiProperty({ example: 1, description: 'Directory id of the owning user' })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ownerId!: number;

  @ApiProperty({ enum: TaskStatus, required: false, description: 'Only tasks in this status' })
  @IsEnum(TaskStatus)
  @IsOptional()
  status?: TaskStatus;
}

/** Route parameter of the /tasks/:id endpoints */
export class TaskIdParamDto {
  @ApiProperty({ example: '123e4567-e89b-42d3-a456-426614174000' })
  @IsUUID()
  id!: string;
}
