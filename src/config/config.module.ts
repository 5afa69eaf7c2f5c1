import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
      // SQS_QUEUE_URL=${AWS_ENDPOINT}/000000000000/jobs style references
      expandVariables: true,
    }),
  ],
})
export class ConfigModule {}
