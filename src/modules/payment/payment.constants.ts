export const PAYMENT_CLIENT_CONFIG = 'PAYMENT_CLIENT_CONFIG';

export const WEBHOOK_SIGNATURE_HEADER = 'x-taler-signature';

export const DEFAULT_CURRENCY = 'EUR';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const MERCHANT_API_PATHS = {
  orders: 'private/orders',
  order: (orderId: string) => `private/orders/${encodeURIComponent(orderId)}`,
  refund: (orderId: string) => `private/orders/${encodeURIComponent(orderId)}/refund`,
} as const;
