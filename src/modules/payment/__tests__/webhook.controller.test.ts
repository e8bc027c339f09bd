/**
 * Unit tests for the webhook endpoint
 */

import { BadRequestException, InternalServerErrorException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { PaymentClient } from '../client/payment.client';
import { WebhookEvent } from '../client/payment-client.interface';
import { WebhookController } from '../controllers/http/webhook.controller';
import { WebhookEventType } from '../events/payment-events';
import { PaymentModule } from '../payment.module';
import { PaymentEventsService } from '../services/payment-events.service';
import { flipLastBit, signPayload } from '../../../__tests__/utils/mock-helpers';

const SECRET = 'test-secret';

describe('WebhookController', () => {
  let moduleRef: TestingModule;
  let controller: WebhookController;
  let paymentEvents: PaymentEventsService;
  let received: WebhookEvent[];
  let closed: boolean;

  const deliver = (body: string, signature?: string) =>
    controller.handleWebhook(Buffer.from(body), signature);

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        PaymentModule.forRoot({
          backendBaseUrl: 'https://merchant.example.com',
          apiKey: 'test_api_key',
          webhookSecret: SECRET,
        }),
      ],
    }).compile();

    controller = moduleRef.get(WebhookController);
    paymentEvents = moduleRef.get(PaymentEventsService);
    received = [];
    closed = false;
    paymentEvents.events$.subscribe((event) => received.push(event));
  });

  afterEach(async () => {
    if (!closed) {
      await moduleRef.close();
    }
  });

  it('should acknowledge and publish a verified event', () => {
    const body = JSON.stringify({ type: 'payment.succeeded', payload: { order_id: 'prod-42' } });

    expect(deliver(body, signPayload(SECRET, body))).toEqual({ received: true });
    expect(received).toEqual([
      {
        type: 'payment.succeeded',
        orderId: 'prod-42',
        rawPayload: { type: 'payment.succeeded', payload: { order_id: 'prod-42' } },
      },
    ]);
  });

  it('should filter published events by type', () => {
    const failed: string[] = [];
    paymentEvents
      .ofType(WebhookEventType.PAYMENT_FAILED)
      .subscribe((event) => failed.push(event.orderId));

    const succeeded = JSON.stringify({ type: 'payment.succeeded', payload: { order_id: 'a' } });
    const failedBody = JSON.stringify({ type: 'payment.failed', payload: { order_id: 'b' } });
    deliver(succeeded, signPayload(SECRET, succeeded));
    deliver(failedBody, signPayload(SECRET, failedBody));

    expect(failed).toEqual(['b']);
    expect(received).toHaveLength(2);
  });

  it('should answer 400 for an invalid signature', () => {
    const body = JSON.stringify({ type: 'payment.succeeded', payload: { order_id: 'prod-42' } });

    expect(() => deliver(body, flipLastBit(signPayload(SECRET, body)))).toThrow(
      BadRequestException,
    );
    expect(() => deliver(body, undefined)).toThrow('Invalid signature');
    expect(received).toHaveLength(0);
  });

  it('should answer 400 for a malformed payload', () => {
    const body = '{"type": "payment.succeeded"}';

    expect(() => deliver(body, signPayload(SECRET, body))).toThrow(BadRequestException);
    expect(received).toHaveLength(0);
  });

  it('should answer 500 when the raw body was not captured', () => {
    expect(() => controller.handleWebhook(undefined, 'signature')).toThrow(
      InternalServerErrorException,
    );
  });

  it('should answer 500 on unexpected failures', () => {
    jest.spyOn(moduleRef.get(PaymentClient), 'handleWebhook').mockImplementation(() => {
      throw new Error('boom');
    });

    expect(() => deliver('{}', 'signature')).toThrow(InternalServerErrorException);
  });

  it('should complete the event stream on shutdown', async () => {
    const complete = jest.fn();
    paymentEvents.events$.subscribe({ complete });

    await moduleRef.close();
    closed = true;

    expect(complete).toHaveBeenCalledTimes(1);
  });
});
