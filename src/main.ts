import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { CorsSettings, toCorsOptions } from './config/cors.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  app.enableShutdownHooks();

  const cors = configService.getOrThrow<CorsSettings>('cors');
  app.enableCors(toCorsOptions(cors));
  logger.log(`CORS enabled for origins: ${cors.origins.join(', ')}`);

  const config = new DocumentBuilder()
    .setTitle('Task Management API')
    .setDescription('Task lifecycle management for directory users')
    .setVersion(configService.get<string>('app.version') ?? '1.0.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = configService.get<number>('app.port') ?? 3000;
  await app.listen(port);
  logger.log(`Application running on port ${port} (${configService.get<string>('app.environment')})`);
  logger.log(`API documentation available at http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Application failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
