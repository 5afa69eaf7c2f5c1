import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { ConsumerService } from './consumer.service';

@Module({
  imports: [InfrastructureModule],
  providers: [ConsumerService],
  exports: [ConsumerService],
})
export class ConsumerModule {}
