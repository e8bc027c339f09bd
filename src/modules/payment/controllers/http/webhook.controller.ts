import {
  BadRequestException,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Post,
} from '@nestjs/common';
import { LoggerService } from '../../../../shared/services/logger.service';
import { PaymentClient } from '../../client/payment.client';
import { PaymentClientError } from '../../errors/payment-client.errors';
import { WEBHOOK_SIGNATURE_HEADER } from '../../payment.constants';
import { PaymentEventsService } from '../../services/payment-events.service';
import { RawBody } from './raw-body.decorator';

export interface WebhookAck {
  received: true;
}

@Controller('taler')
export class WebhookController {
  constructor(
    private readonly paymentClient: PaymentClient,
    private readonly paymentEvents: PaymentEventsService,
    private readonly logger: LoggerService,
  ) {}

  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  handleWebhook(
    @RawBody() rawBody: Buffer | undefined,
    @Headers(WEBHOOK_SIGNATURE_HEADER) signature: string | undefined,
  ): WebhookAck {
    if (!rawBody) {
      this.logger.error(
        'Raw request body unavailable; create the app with rawBody enabled',
        undefined,
        WebhookController.name,
      );
      throw new InternalServerErrorException('Internal Server Error');
    }

    try {
      const event = this.paymentClient.handleWebhook(rawBody, signature);
      this.paymentEvents.publish(event);
    } catch (error) {
      if (error instanceof PaymentClientError && error.httpStatus === HttpStatus.BAD_REQUEST) {
        this.logger.warn(`Rejected webhook: ${error.message}`, WebhookController.name);
        throw new BadRequestException(error.message);
      }

      this.logger.error(
        `Error processing webhook: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
        WebhookController.name,
      );
      throw new InternalServerErrorException('Internal Server Error');
    }

    return { received: true };
  }
}
