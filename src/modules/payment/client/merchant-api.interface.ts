/**
 * Merchant backend wire types
 */

import { JsonValue } from './payment-client.interface';

export interface MerchantTimestamp {
  t_s: number;
}

export interface MerchantRelativeTime {
  d_us: number;
}

export interface MerchantOrderTerms {
  summary?: string;
  order_id?: string;
  amount: string;
  fulfillment_url?: string;
  public_reorder_url?: string;
  refund_deadline?: MerchantTimestamp;
  pay_deadline?: MerchantTimestamp;
  auto_refund?: MerchantRelativeTime;
  metadata?: Record<string, JsonValue>;
}

export interface MerchantCreateOrderRequestBody {
  order: MerchantOrderTerms;
  create_token: boolean;
}

export interface MerchantRefundRequestBody {
  refund?: string;
  reason?: string;
}

/**
 * Fields read from order responses; everything else is passed through.
 */
export interface MerchantOrderResponse {
  order_id?: string;
  order_status?: string;
  token?: string;
  taler_pay_uri?: string;
  payment_redirect_url?: string;
}

export interface MerchantRefundResponse {
  refund_id?: string;
  h_contract?: string;
  taler_refund_uri?: string;
}
