import { Global, Module } from '@nestjs/common';
import { CancellationRegistry } from './cancellation/cancellation.registry';

@Global()
@Module({
  providers: [CancellationRegistry],
  exports: [CancellationRegistry],
})
export class BoundaryModule {}
