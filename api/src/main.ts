import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { resolveReportCardConfig } from './contexts/report-card';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);

  // DTO validation
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.setGlobalPrefix('api');

  const config = resolveReportCardConfig(app.get(ConfigService));
  const port = process.env.PORT ?? 4000;
  await app.listen(port);

  logger.log(`Report card API running on http://localhost:${port}/api`);
  logger.log(`Mappings: ${config.mappingsDir}, output: ${config.outputDir}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
