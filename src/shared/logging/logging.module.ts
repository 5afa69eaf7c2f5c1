import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { PinoLoggerService } from './pino-logger.service';

// Token for injecting the narrow AppLogger interface
export const APP_LOGGER = 'AppLogger';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [PinoLoggerService, { provide: APP_LOGGER, useExisting: PinoLoggerService }],
  exports: [PinoLoggerService, APP_LOGGER],
})
export class LoggingModule {}
