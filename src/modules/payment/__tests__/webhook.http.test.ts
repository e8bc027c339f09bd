/**
 * Webhook endpoint over HTTP, through the host app's body parsing
 */

import axios, { AxiosInstance } from 'axios';
import { NestExpressApplication } from '@nestjs/platform-express';
import { createHttpApp } from '../../../http-app.factory';
import { WebhookEvent } from '../client/payment-client.interface';
import { WEBHOOK_SIGNATURE_HEADER } from '../payment.constants';
import { PaymentEventsService } from '../services/payment-events.service';
import { signPayload } from '../../../__tests__/utils/mock-helpers';

const SECRET = 'test-secret';

describe('POST /taler/webhook', () => {
  let app: NestExpressApplication;
  let http: AxiosInstance;
  let received: WebhookEvent[];

  const post = (body: string, contentType: string, signature?: string) =>
    http.post<unknown>('/taler/webhook', Buffer.from(body), {
      headers: {
        'Content-Type': contentType,
        ...(signature === undefined ? {} : { [WEBHOOK_SIGNATURE_HEADER]: signature }),
      },
    });

  beforeAll(async () => {
    app = await createHttpApp();
    await app.listen(0, '127.0.0.1');
    http = axios.create({ baseURL: await app.getUrl(), validateStatus: () => true });

    received = [];
    app.get(PaymentEventsService).events$.subscribe((event) => received.push(event));
  });

  beforeEach(() => {
    received.length = 0;
  });

  afterAll(async () => {
    await app.close();
  });

  it.each(['application/json', 'text/plain', 'application/octet-stream'])(
    'should accept a signed delivery sent as %s',
    async (contentType) => {
      const body = JSON.stringify({ type: 'payment.succeeded', payload: { order_id: 'prod-42' } });

      const response = await post(body, contentType, signPayload(SECRET, body));

      expect(response.status).toBe(200);
      expect(response.data).toEqual({ received: true });
      expect(received).toEqual([
        {
          type: 'payment.succeeded',
          orderId: 'prod-42',
          rawPayload: { type: 'payment.succeeded', payload: { order_id: 'prod-42' } },
        },
      ]);
    },
  );

  it('should check the signature before parsing a JSON body', async () => {
    const response = await post('{bad', 'application/json', 'deadbeef');

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ statusCode: 400, message: 'Invalid signature' });
    expect(received).toHaveLength(0);
  });

  it('should reject a missing signature', async () => {
    const body = JSON.stringify({ type: 'payment.succeeded', payload: { order_id: 'prod-42' } });

    const response = await post(body, 'application/json');

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ message: 'Invalid signature' });
  });

  it('should reject a signed body that is not JSON', async () => {
    const response = await post('{bad', 'application/json', signPayload(SECRET, '{bad'));

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ message: 'Invalid JSON payload' });
    expect(received).toHaveLength(0);
  });
});
