import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  // validated by ConfigModule before we get here
  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  new Logger('Bootstrap').log(`🚀 Recording pipeline listening on :${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('💥 Bootstrap failed:', error);
  process.exit(1);
});
