import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { JsonRpcExceptionFilter } from './common/filters/json-rpc-exception.filter';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3000);
  const host = configService.get<string>('HOST', '127.0.0.1');

  // JSON-RPC error body for every HTTP failure
  app.useGlobalFilters(new JsonRpcExceptionFilter());
  app.enableShutdownHooks();

  await app.listen(port, host);
  logger.log(`MCP endpoint listening on http://${host}:${port}/mcp`);
  logger.log(
    `Store backend: ${configService.get<string>('STORE_BACKEND', 'memory')}, response mode: ${configService.get<string>('RESPONSE_MODE', 'sse')}`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : 'Unknown error'}`,
  );
  process.exit(1);
});
