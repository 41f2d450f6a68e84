import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StreamModeService } from './stream-mode.service';

@Module({
  imports: [ConfigModule],
  providers: [StreamModeService],
  exports: [StreamModeService],
})
export class StreamModeModule {}
