import dayjs, { Dayjs } from 'dayjs';
import {
  InvalidRequestError,
  MalformedPayloadError,
  MalformedResponseError,
} from '../errors/payment-client.errors';
import {
  MerchantCreateOrderRequestBody,
  MerchantOrderResponse,
  MerchantRefundRequestBody,
  MerchantRefundResponse,
  MerchantRelativeTime,
  MerchantTimestamp,
} from './merchant-api.interface';
import { isValidCurrency } from './payment-client.config';
import {
  OrderRequest,
  OrderResult,
  RefundRequest,
  RefundResult,
  WebhookEvent,
} from './payment-client.interface';

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;
const AMOUNT_FRACTION_DIGITS = 8;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

// String() switches to exponent notation below 1e-6
const numberToDecimal = (amount: number): string => {
  const plain = String(amount);
  if (!plain.includes('e') || Math.abs(amount) >= 1) {
    return plain;
  }
  const fixed = amount.toFixed(AMOUNT_FRACTION_DIGITS).replace(/\.?0+$/, '');
  return fixed === '0' && amount !== 0 ? plain : fixed;
};

export const formatAmountValue = (amount: number | string): string => {
  const value = typeof amount === 'number' ? numberToDecimal(amount) : amount.trim();
  if (!DECIMAL_PATTERN.test(value)) {
    throw new InvalidRequestError(`Invalid amount: ${String(amount)}`);
  }
  return value;
};

export const formatAmount = (currency: string, amount: number | string): string =>
  `${currency}:${formatAmountValue(amount)}`;

const toTimestamp = (date: Date, field: string): MerchantTimestamp => {
  const value = dayjs(date);
  if (!value.isValid()) {
    throw new InvalidRequestError(`Invalid ${field}`);
  }
  return { t_s: value.unix() };
};

const toRelativeTime = (deadline: Date, now: Dayjs): MerchantRelativeTime => {
  const value = dayjs(deadline);
  if (!value.isValid()) {
    throw new InvalidRequestError('Invalid autoRefundDeadline');
  }
  return { d_us: Math.max(0, value.diff(now)) * 1000 };
};

export function buildCreateOrderBody(
  request: OrderRequest,
  defaultCurrency: string,
  now: Dayjs = dayjs(),
): MerchantCreateOrderRequestBody {
  const currency = request.currency || defaultCurrency;
  if (!isValidCurrency(currency)) {
    throw new InvalidRequestError(`Invalid currency: ${currency}`);
  }

  const body: MerchantCreateOrderRequestBody = {
    order: {
      summary: request.description,
      order_id: request.orderId,
      amount: formatAmount(currency, request.amount),
      fulfillment_url: request.fulfillmentUrl,
      public_reorder_url: request.publicReorderUrl,
      refund_deadline: request.refundDeadline && toTimestamp(request.refundDeadline, 'refundDeadline'),
      pay_deadline: request.payDeadline && toTimestamp(request.payDeadline, 'payDeadline'),
      auto_refund: request.autoRefundDeadline && toRelativeTime(request.autoRefundDeadline, now),
    },
    create_token: true,
  };

  if (request.metadata !== undefined) {
    body.order.metadata = request.metadata;
  }

  return body;
}

export function buildRefundBody(request: RefundRequest): MerchantRefundRequestBody {
  const body: MerchantRefundRequestBody = {};
  if (request.amount !== undefined) {
    body.refund = formatAmountValue(request.amount);
  }
  if (request.reason !== undefined) {
    body.reason = request.reason;
  }
  return body;
}

/**
 * @param fallbackOrderId used when the backend omits `order_id`, as it does for unclaimed orders
 */
export function toOrderResult(payload: unknown, fallbackOrderId?: string): OrderResult {
  if (!isRecord(payload)) {
    throw new MalformedResponseError('Order response is not a JSON object', payload);
  }

  const order: MerchantOrderResponse = {
    order_id: readString(payload, 'order_id'),
    order_status: readString(payload, 'order_status'),
    token: readString(payload, 'token'),
    taler_pay_uri: readString(payload, 'taler_pay_uri'),
    payment_redirect_url: readString(payload, 'payment_redirect_url'),
  };

  const orderId = order.order_id ?? fallbackOrderId;
  if (!orderId) {
    throw new MalformedResponseError('Order response is missing order_id', payload);
  }

  return {
    orderId,
    paymentRedirectUri: order.taler_pay_uri ?? order.payment_redirect_url,
    orderStatus: order.order_status,
    claimToken: order.token,
    rawBackendPayload: payload,
  };
}

export function toRefundResult(payload: unknown): RefundResult {
  if (!isRecord(payload)) {
    throw new MalformedResponseError('Refund response is not a JSON object', payload);
  }

  const refund: MerchantRefundResponse = {
    refund_id: readString(payload, 'refund_id'),
    h_contract: readString(payload, 'h_contract'),
    taler_refund_uri: readString(payload, 'taler_refund_uri'),
  };

  const refundId = refund.refund_id ?? refund.h_contract;
  if (!refundId) {
    throw new MalformedResponseError('Refund response is missing a refund identifier', payload);
  }

  return {
    refundId,
    refundUri: refund.taler_refund_uri,
    rawBackendPayload: payload,
  };
}

export function toWebhookEvent(rawBody: string): WebhookEvent {
  let payload: unknown;
  try {
    payload = JSON.parse(rawBody);
  } catch (error) {
    throw new MalformedPayloadError('Invalid JSON payload', { cause: error });
  }

  if (!isRecord(payload)) {
    throw new MalformedPayloadError('Webhook payload is not a JSON object');
  }

  const type = readString(payload, 'type');
  if (!type) {
    throw new MalformedPayloadError('Webhook payload is missing type');
  }

  const orderRef = payload.payload;
  const orderId = isRecord(orderRef) ? readString(orderRef, 'order_id') : undefined;
  if (!orderId) {
    throw new MalformedPayloadError('Webhook payload is missing payload.order_id');
  }

  return { type, orderId, rawPayload: payload };
}
