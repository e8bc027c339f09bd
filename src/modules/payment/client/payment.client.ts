import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import * as crypto from 'crypto';
import { TextDecoder } from 'util';
import { createLogger, describeError } from '../../../shared/logger';
import {
  BackendError,
  InvalidRequestError,
  MalformedPayloadError,
  SignatureInvalidError,
  TransportError,
} from '../errors/payment-client.errors';
import { WebhookEventType } from '../events/payment-events';
import { MERCHANT_API_PATHS } from '../payment.constants';
import {
  buildCreateOrderBody,
  buildRefundBody,
  toOrderResult,
  toRefundResult,
  toWebhookEvent,
} from './merchant-api.mapper';
import { resolveClientConfig } from './payment-client.config';
import {
  ClientConfig,
  ClientConfigInput,
  OrderRequest,
  OrderResult,
  PaymentClientLogger,
  RefundRequest,
  RefundResult,
  RequestOptions,
  WebhookEvent,
} from './payment-client.interface';
import { MerchantOperation, ResponseOutcome, ResponseStatusMapper } from './status.mapper';

export interface PaymentClientOptions {
  /** Transport to send requests through; a fresh axios instance when omitted. */
  httpClient?: AxiosInstance;
  logger?: PaymentClientLogger;
}

interface MerchantResponse {
  outcome: ResponseOutcome;
  status: number;
  data: unknown;
}

/**
 * Client for the merchant backend's private order API.
 *
 * Holds no per-call state, so one instance can be shared by concurrent callers.
 * Requests are never retried: a repeated order or refund is only deduplicated
 * by the backend's own `order_id` handling.
 */
export class PaymentClient {
  readonly config: ClientConfig;
  private readonly httpClient: AxiosInstance;
  private readonly logger: PaymentClientLogger;
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(config: ClientConfigInput, options: PaymentClientOptions = {}) {
    this.config = resolveClientConfig(config);
    this.httpClient = options.httpClient ?? axios.create();
    this.logger = options.logger ?? createLogger({ context: PaymentClient.name });
  }

  async createOrder(request: OrderRequest, options?: RequestOptions): Promise<OrderResult> {
    const body = buildCreateOrderBody(request, this.config.defaultCurrency);

    const response = await this.send(
      MerchantOperation.CREATE_ORDER,
      'POST',
      MERCHANT_API_PATHS.orders,
      body,
      options,
    );
    this.assertSuccess(MerchantOperation.CREATE_ORDER, response);

    const order = toOrderResult(response.data);
    this.logger.info('Order created', { orderId: order.orderId, amount: body.order.amount });
    return order;
  }

  /**
   * @returns `undefined` when the order does not exist or is no longer payable
   */
  async getPaymentUrl(orderId: string, options?: RequestOptions): Promise<string | undefined> {
    const order = await this.getOrder(orderId, options);
    return order?.paymentRedirectUri;
  }

  async getOrder(orderId: string, options?: RequestOptions): Promise<OrderResult | undefined> {
    this.assertOrderId(orderId);

    const response = await this.send(
      MerchantOperation.GET_ORDER,
      'GET',
      MERCHANT_API_PATHS.order(orderId),
      undefined,
      options,
    );
    if (response.outcome === ResponseOutcome.NOT_FOUND) {
      this.logger.debug('Order not found', { orderId });
      return undefined;
    }
    this.assertSuccess(MerchantOperation.GET_ORDER, response);

    return toOrderResult(response.data, orderId);
  }

  async processRefund(
    request: RefundRequest,
    options?: RequestOptions,
  ): Promise<RefundResult | undefined> {
    this.assertOrderId(request.orderId);
    const body = buildRefundBody(request);

    const response = await this.send(
      MerchantOperation.PROCESS_REFUND,
      'POST',
      MERCHANT_API_PATHS.refund(request.orderId),
      body,
      options,
    );
    if (response.outcome === ResponseOutcome.NOT_FOUND) {
      this.logger.warn('Refund requested for unknown order', { orderId: request.orderId });
      return undefined;
    }
    this.assertSuccess(MerchantOperation.PROCESS_REFUND, response);

    const refund = toRefundResult(response.data);
    this.logger.info('Refund processed', {
      orderId: request.orderId,
      refundId: refund.refundId,
      partial: body.refund !== undefined,
    });
    return refund;
  }

  /**
   * Checks the `X-Taler-Signature` header against an HMAC-SHA256 of the raw,
   * unparsed request body. Returns false when no webhook secret is configured.
   */
  verifyWebhookSignature(rawPayload: Uint8Array | string, signature?: string | null): boolean {
    const secret = this.config.webhookSecret;
    if (!secret) {
      this.logger.error('Webhook secret is not configured');
      return false;
    }

    if (!signature) {
      return false;
    }

    const expected = Buffer.from(
      crypto.createHmac('sha256', secret).update(rawPayload).digest('hex'),
      'utf-8',
    );
    const received = Buffer.from(signature, 'utf-8');
    if (expected.length !== received.length) {
      return false;
    }

    return crypto.timingSafeEqual(expected, received);
  }

  /**
   * Verifies and decodes a webhook delivery. Acting on the event is up to the caller.
   */
  handleWebhook(rawPayload: Uint8Array | string, signature?: string | null): WebhookEvent {
    if (!this.verifyWebhookSignature(rawPayload, signature)) {
      this.logger.warn('Invalid webhook signature');
      throw new SignatureInvalidError();
    }

    const event = toWebhookEvent(this.decode(rawPayload));

    switch (event.type) {
      case WebhookEventType.PAYMENT_SUCCEEDED:
        this.logger.info(`Payment succeeded for order: ${event.orderId}`);
        break;
      case WebhookEventType.PAYMENT_FAILED:
        this.logger.info(`Payment failed for order: ${event.orderId}`);
        break;
      default:
        this.logger.debug('Received webhook event', { type: event.type, orderId: event.orderId });
    }

    return event;
  }

  private decode(rawPayload: Uint8Array | string): string {
    if (typeof rawPayload === 'string') {
      return rawPayload;
    }
    try {
      return this.utf8.decode(rawPayload);
    } catch (error) {
      throw new MalformedPayloadError('Webhook payload is not valid UTF-8', { cause: error });
    }
  }

  private assertOrderId(orderId: string): void {
    if (!orderId.trim()) {
      throw new InvalidRequestError('Order id is required');
    }
  }

  private assertSuccess(operation: MerchantOperation, response: MerchantResponse): void {
    if (response.outcome === ResponseOutcome.SUCCESS) {
      return;
    }

    this.logger.error('Merchant backend rejected request', {
      operation,
      status: response.status,
      body: response.data,
    });
    throw new BackendError(response.status, response.data);
  }

  private async send(
    operation: MerchantOperation,
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    options: RequestOptions = {},
  ): Promise<MerchantResponse> {
    const url = new URL(path, this.config.backendBaseUrl).toString();
    this.logger.debug('Sending merchant backend request', { operation, method, url });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.request<unknown>({
        method,
        url,
        data: body,
        headers: this.buildHeaders(body !== undefined),
        timeout: this.config.timeoutMs,
        // Timeouts surface as ETIMEDOUT instead of the generic ECONNABORTED
        transitional: { clarifyTimeoutError: true },
        signal: options.signal,
        // Statuses are dispatched by ResponseStatusMapper
        validateStatus: () => true,
      });
    } catch (error) {
      const transportError = this.toTransportError(error);
      this.logger.error('Merchant backend request failed', {
        operation,
        url,
        cancelled: transportError.cancelled,
        timedOut: transportError.timedOut,
        error: describeError(error),
      });
      throw transportError;
    }

    return {
      outcome: ResponseStatusMapper.toOutcome(operation, response.status),
      status: response.status,
      data: response.data,
    };
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Basic ${this.config.apiKey}`,
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  private toTransportError(error: unknown): TransportError {
    if (axios.isCancel(error)) {
      return new TransportError('Merchant backend request was cancelled', error, true);
    }

    if (axios.isAxiosError(error) && error.code === AxiosError.ETIMEDOUT) {
      return new TransportError(
        `Merchant backend request timed out after ${this.config.timeoutMs}ms`,
        error,
        false,
        true,
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`Merchant backend request failed: ${message}`, error);
  }
}
