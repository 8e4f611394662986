import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createInterface } from 'readline';
import { AppModule } from './app.module';
import { ChatService } from './chat/chat.service';

// Terminal front-end: one chat session against the configured store.
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  const chat = app.get(ChatService);
  const { sessionId, reply } = chat.open();

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  console.log(`${reply.text}\n`);
  rl.prompt();

  rl.on('line', (line) => {
    if (line.trim().toLowerCase() === 'exit') {
      rl.close();
      return;
    }
    console.log(`\n${chat.send(sessionId, line).text}\n`);
    rl.prompt();
  });

  rl.on('close', () => {
    chat.close(sessionId);
    app.close().catch((error: unknown) => {
      new Logger('ChatCli').error('Shutdown failed', error);
      process.exitCode = 1;
    });
  });
}

bootstrap().catch((error: unknown) => {
  new Logger('ChatCli').error('Could not start the chat', error);
  process.exitCode = 1;
});
