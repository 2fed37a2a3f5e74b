import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { corsOrigins, persistenceDriver } from './common/config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const port = process.env.PORT || 3001;
  logger.log(`Starting API on port ${port} (persistence: ${persistenceDriver()})...`);

  const app = await NestFactory.create(AppModule);
  app.enableCors({
    origin: corsOrigins(),
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    credentials: true,
  });
  await app.listen(port, '0.0.0.0');
  logger.log(`Application is running on: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('API failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
