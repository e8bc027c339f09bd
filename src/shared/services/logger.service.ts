import { ConsoleLogger, Injectable } from '@nestjs/common';
import winston from 'winston';
import { AppConfigService } from './config.service';

@Injectable()
export class LoggerService extends ConsoleLogger {
  private readonly logger: winston.Logger;

  constructor(private readonly configService: AppConfigService) {
    super(LoggerService.name, { timestamp: true });
    this.logger = winston.createLogger(configService.winstonConfig);
    if (this.configService.nodeEnv !== 'production') {
      this.logger.debug('Logging initialized', { level: this.configService.appConfig.logLevel });
    }
  }

  /**
   * Structured logger bound to a context, for collaborators outside Nest's logger API.
   */
  forContext(context: string): winston.Logger {
    return this.logger.child({ context });
  }

  error(message: string, trace?: string, context?: string): void {
    this.logger.error(message, { trace, context: context ?? this.context });
  }
  log(message: string, context?: string) {
    this.logger.info(message, { context: context ?? this.context });
  }
  info(message: string, context?: string) {
    this.logger.info(message, { context: context ?? this.context });
  }
  debug(message: string, context?: string) {
    this.logger.debug(message, { context: context ?? this.context });
  }
  warn(message: string, context?: string) {
    this.logger.warn(message, { context: context ?? this.context });
  }
}
