import { Module } from '@nestjs/common';
import { LokiLoggerService } from './loki-logger.service';

@Module({
  providers: [
    {
      provide: 'JOB_NAME',
      useValue: process.env.JOB_NAME || 'statute-assistant-api',
    },
    {
      provide: 'APP_NAME',
      useValue: process.env.APP_NAME || 'statute-assistant',
    },
    {
      provide: 'LOKI_HOST',
      useValue: process.env.LOKI_HOST || '',
    },
    LokiLoggerService,
    {
      provide: 'LOGGER_SERVICE',
      useExisting: LokiLoggerService,
    },
  ],
  exports: [
    'LOGGER_SERVICE', // main abstraction
    LokiLoggerService,
    'JOB_NAME',
    'APP_NAME',
  ],
})
export class LoggingModule {}
