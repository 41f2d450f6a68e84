import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TransportModule } from '../transport/transport.module';
import { IdleReaperService } from './idle-reaper.service';

@Module({
  imports: [ConfigModule, TransportModule],
  providers: [IdleReaperService],
  exports: [IdleReaperService],
})
export class ReaperModule {}
