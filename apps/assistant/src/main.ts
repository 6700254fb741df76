import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AssistantModule } from './AssistantModule';
import { AssistantRepl } from './AssistantRepl';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AssistantModule, {
    logger: ['error', 'warn'],
  });

  app.enableShutdownHooks();
  await app.get(AssistantRepl).run();
  await app.close();
}

void bootstrap();
