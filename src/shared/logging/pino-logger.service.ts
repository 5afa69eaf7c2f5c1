import { Injectable, LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

/**
 * Logging surface the consumer core depends on.
 * Kept narrow so unit tests can hand in a plain object of spies.
 */
export interface AppLogger {
  info(obj: Record<string, unknown>, message: string): void;
  warn(obj: Record<string, unknown>, message: string): void;
  error(obj: Record<string, unknown>, message: string): void;
  debug(obj: Record<string, unknown>, message: string): void;
  child(bindings: Record<string, unknown>): AppLogger;
}

@Injectable()
export class PinoLoggerService implements LoggerService, AppLogger {
  private logger: Logger;
  private context?: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger = pino({
      level: logLevel,
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'queue-consumer',
        env: nodeEnv,
      },
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  private formatMessage(
    message: string,
    context?: string,
  ): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  private withContext(obj: Record<string, unknown>): Record<string, unknown> {
    return this.context ? { ...obj, context: this.context } : obj;
  }

  log(message: string, context?: string): void {
    this.logger.info(this.formatMessage(message, context));
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.formatMessage(objOrMessage));
    } else {
      this.logger.info(this.withContext(objOrMessage), message || '');
    }
  }

  error(
    message: string | Record<string, unknown>,
    trace?: string,
    context?: string,
  ): void {
    if (typeof message === 'object') {
      this.logger.error(this.withContext(message), trace || '');
    } else {
      this.logger.error({ trace, ...this.formatMessage(message, context) }, message);
    }
  }

  warn(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.warn(this.withContext(message), context || '');
    } else {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  debug(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.debug(this.withContext(message), context || '');
    } else {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.formatMessage(message, context));
  }

  child(bindings: Record<string, unknown>): PinoLoggerService {
    const childLogger: PinoLoggerService = Object.create(this);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }
}
