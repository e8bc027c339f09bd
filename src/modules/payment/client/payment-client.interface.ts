export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface ClientConfigInput {
  backendBaseUrl: string | URL;
  apiKey: string;
  defaultCurrency?: string;
  webhookSecret?: string;
  timeoutMs?: number;
}

export interface ClientConfig {
  readonly backendBaseUrl: URL;
  readonly apiKey: string;
  readonly defaultCurrency: string;
  readonly webhookSecret?: string;
  readonly timeoutMs: number;
}

export interface OrderRequest {
  amount: number | string;
  currency?: string;
  orderId?: string;
  description?: string;
  fulfillmentUrl?: string;
  metadata?: Record<string, JsonValue>;
  autoRefundDeadline?: Date;
  payDeadline?: Date;
  refundDeadline?: Date;
  publicReorderUrl?: string;
}

export interface OrderResult {
  orderId: string;
  paymentRedirectUri?: string;
  orderStatus?: string;
  claimToken?: string;
  rawBackendPayload: Record<string, unknown>;
}

export interface RefundRequest {
  orderId: string;
  /** Omit for a full refund. */
  amount?: number | string;
  reason?: string;
}

export interface RefundResult {
  refundId: string;
  refundUri?: string;
  rawBackendPayload: Record<string, unknown>;
}

export interface WebhookEvent {
  type: string;
  orderId: string;
  rawPayload: Record<string, unknown>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Any winston logger satisfies this.
 */
export interface PaymentClientLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
