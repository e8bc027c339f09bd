import { HttpModule, HttpService } from '@nestjs/axios';
import { DynamicModule, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { raw } from 'express';
import { SharedModule } from '../../shared.module';
import { AppConfigService } from '../../shared/services/config.service';
import { LoggerService } from '../../shared/services/logger.service';
import { PaymentClient } from './client/payment.client';
import { ClientConfigInput } from './client/payment-client.interface';
import { WebhookController } from './controllers/http/webhook.controller';
import { PAYMENT_CLIENT_CONFIG } from './payment.constants';
import { PaymentEventsService } from './services/payment-events.service';

/**
 * Webhook routes get a raw body parser of any content type so the signature is
 * checked over the exact bytes. Hosts create the app with `bodyParser: false`;
 * otherwise Express parses JSON deliveries before they are verified.
 */
@Module({})
export class PaymentModule implements NestModule {
  /**
   * @param config client configuration; read from the environment through
   * `AppConfigService` when omitted
   */
  static forRoot(config?: ClientConfigInput): DynamicModule {
    return {
      module: PaymentModule,
      global: true,
      imports: [SharedModule, HttpModule],
      controllers: [WebhookController],
      providers: [
        {
          provide: PAYMENT_CLIENT_CONFIG,
          useFactory: (configService: AppConfigService): ClientConfigInput =>
            config ?? configService.paymentClientConfig,
          inject: [AppConfigService],
        },
        {
          provide: PaymentClient,
          useFactory: (
            clientConfig: ClientConfigInput,
            httpService: HttpService,
            logger: LoggerService,
          ): PaymentClient =>
            new PaymentClient(clientConfig, {
              httpClient: httpService.axiosRef,
              logger: logger.forContext(PaymentClient.name),
            }),
          inject: [PAYMENT_CLIENT_CONFIG, HttpService, LoggerService],
        },
        PaymentEventsService,
      ],
      exports: [PaymentClient, PaymentEventsService],
    };
  }

  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(raw({ type: '*/*' })).forRoutes(WebhookController);
  }
}
