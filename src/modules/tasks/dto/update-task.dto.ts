import { IsOptional, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * Request body for PATCH /tasks/:id.
 * Status is not editable here; it changes only through the lifecycle endpoints.
 */
export class UpdateTaskDto {
  @ApiProperty({ example: 'Bank reconciliation (March)', required: false })
  @IsString()
  @IsOptional()
  title?: string;

  @ApiProperty({ example: 'Reconcile checking and savings accounts', required: false })
  @IsString()
  @IsOptional()
  description?: string;
}
