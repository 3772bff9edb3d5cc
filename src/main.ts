import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableCors();
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const envFile = configService.get<string>('ENV_FILE') || '.env';
  const port = configService.get<number>('PORT', 3000);

  await app.listen(port);
  Logger.log(
    `Invoice assistant is running on: http://localhost:${port} with env: ${envFile}`,
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start the invoice assistant', error);
  process.exit(1);
});
