import 'reflect-metadata';
import { createHttpApp } from './http-app.factory';
import { createLogger, describeError } from './shared/logger';
import { AppConfigService } from './shared/services/config.service';
import { LoggerService } from './shared/services/logger.service';

async function bootstrap() {
  const app = await createHttpApp();
  app.enableShutdownHooks();

  const { port } = app.get(AppConfigService).appConfig;
  await app.listen(port);
  app.get(LoggerService).log(`HTTP server running on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  createLogger({ context: 'Bootstrap' }).error('Failed to start HTTP server', {
    error: describeError(error),
  });
  process.exitCode = 1;
});
