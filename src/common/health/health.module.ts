import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { VersionController } from './version.controller';

/**
 * Operational endpoints: health probes (database connectivity, memory usage)
 * and the service version
 */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController, VersionController],
})
export class HealthModule {}
