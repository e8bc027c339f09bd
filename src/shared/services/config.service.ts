import { Injectable } from '@nestjs/common';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as dotenv from 'dotenv';
import { ClientConfigInput } from '../../modules/payment/client/payment-client.interface';

@Injectable()
export class AppConfigService {
  constructor() {
    dotenv.config({
      path: `.env`,
    });
  }

  public get(key: string): string {
    return process.env[key] || '';
  }

  public getNumber(key: string): number {
    return Number(this.get(key));
  }

  get nodeEnv(): string {
    return this.get('NODE_ENV') || 'development';
  }

  get paymentClientConfig(): ClientConfigInput {
    return {
      backendBaseUrl: this.get('TALER_MERCHANT_BACKEND_URL'),
      apiKey: this.get('TALER_MERCHANT_API_KEY'),
      defaultCurrency: this.get('TALER_DEFAULT_CURRENCY') || undefined,
      webhookSecret: this.get('TALER_WEBHOOK_SECRET') || undefined,
      timeoutMs: this.getNumber('TALER_REQUEST_TIMEOUT_MS') || undefined,
    };
  }

  get winstonConfig(): winston.LoggerOptions {
    const level = this.appConfig.logLevel;
    const transports: winston.transport[] = [
      new winston.transports.Console({
        level,
        handleExceptions: true,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({
            format: 'DD-MM-YYYY HH:mm:ss',
          }),
          winston.format.printf(({ level, message, timestamp, context, trace, ...meta }) => {
            const ctx = context ? ` [${String(context)}]` : '';
            const msgStr = typeof message === 'string' ? message : JSON.stringify(message);
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            const stackStr = trace ? `\n${String(trace)}` : '';
            return `${String(timestamp)} ${level}:${ctx} ${msgStr}${metaStr}${stackStr}`;
          }),
        ),
      }),
    ];

    const logDir = this.get('LOG_DIR');
    if (logDir) {
      transports.push(
        new DailyRotateFile({
          level,
          filename: `${logDir}/${this.nodeEnv}/app-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
        new DailyRotateFile({
          level: 'error',
          filename: `${logDir}/${this.nodeEnv}/error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: false,
          maxSize: '20m',
          maxFiles: '30d',
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
      );
    }

    return {
      level,
      transports,
      exitOnError: false,
    };
  }

  get appConfig() {
    return {
      port: this.getNumber('APP_PORT') || 3000,
      globalPrefix: this.get('APP_GLOBAL_PREFIX'),
      logLevel: this.get('LOG_LEVEL') || 'info',
    };
  }
}
