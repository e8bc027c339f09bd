import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { HttpAppModule } from './http-app.module';
import { AppConfigService } from './shared/services/config.service';
import { LoggerService } from './shared/services/logger.service';

export async function createHttpApp(): Promise<NestExpressApplication> {
  const app = await NestFactory.create<NestExpressApplication>(HttpAppModule, {
    // PaymentModule reads webhook bodies raw; a global JSON parser would consume them first
    bodyParser: false,
    bufferLogs: true,
  });

  app.useLogger(app.get(LoggerService));

  const { globalPrefix } = app.get(AppConfigService).appConfig;
  if (globalPrefix) {
    app.setGlobalPrefix(globalPrefix);
  }

  return app;
}
