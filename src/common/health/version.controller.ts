import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOkResponse, ApiOperation, ApiProperty, ApiTags } from '@nestjs/swagger';
import { SkipRateLimit } from '../decorators/rate-limit.decorator';

export const SERVICE_NAME = 'task-lifecycle-service';

export class VersionInfoDto {
  @ApiProperty({ example: SERVICE_NAME })
  service!: string;

  @ApiProperty({ example: '1.0.0' })
  version!: string;

  @ApiProperty({ example: 'production' })
  environment!: string;

  @ApiProperty({ example: ['task_management', 'user_directory'] })
  features!: string[];
}

@ApiTags('health')
@Controller('version')
@SkipRateLimit()
export class VersionController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  @ApiOperation({ summary: 'Service version and environment' })
  @ApiOkResponse({ type: VersionInfoDto })
  getVersion(): VersionInfoDto {
    return {
      service: SERVICE_NAME,
      version: this.configService.get<string>('app.version') ?? '1.0.0',
      environment: this.configService.get<string>('app.environment') ?? 'development',
      features: ['task_management', 'user_directory', 'rate_limiting', 'health_checks'],
    };
  }
}
