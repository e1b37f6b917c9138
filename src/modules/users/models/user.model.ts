import { ApiProperty } from '@nestjs/swagger';
import { IsEmail, IsEnum, IsInt, IsNotEmpty, IsString, Min } from 'class-validator';

export enum UserStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  SUSPENDED = 'suspended',
}

/**
 * A person in the external user directory.
 * Tasks reference users by `id` only; the directory is not stored with tasks.
 */
export class DirectoryUser {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  id!: number;

  @ApiProperty({ example: 'Alice Moreau' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ example: 'alice.moreau@example.com' })
  @IsEmail()
  email!: string;

  @ApiProperty({ enum: UserStatus, example: UserStatus.ACTIVE })
  @IsEnum(UserStatus)
  status!: UserStatus;

  /** Only active users may receive new tasks */
  isActive(): boolean {
    return this.status === UserStatus.ACTIVE;
  }
}
