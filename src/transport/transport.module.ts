import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DnsRebindingMiddleware } from '../boundary/dns-rebinding/dns-rebinding.middleware';
import { LoggingMiddleware } from '../common/middleware/logging.middleware';
import { StreamModeModule } from '../stream-mode/stream-mode.module';
import { McpController } from './mcp.controller';
import { MethodRegistry } from './method-registry';
import { TransportService } from './transport.service';

@Module({
  imports: [ConfigModule, StreamModeModule],
  controllers: [McpController],
  providers: [MethodRegistry, TransportService],
  exports: [MethodRegistry, TransportService],
})
export class TransportModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    // Host/Origin check runs before anything touches a session
    consumer.apply(LoggingMiddleware, DnsRebindingMiddleware).forRoutes(McpController);
  }
}
