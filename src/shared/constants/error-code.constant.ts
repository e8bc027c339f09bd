export enum ErrorCodeEnum {
  InvalidConfiguration = 30000,
  InvalidRequest = 30001,

  TransportFailed = 30100,
  BackendRejected = 30101,
  MalformedResponse = 30102,

  SignatureInvalid = 30400,
  MalformedPayload = 30401,
}

/**
 * [message, HTTP status the webhook endpoint answers with]
 */
export const ErrorCode = Object.freeze<Record<ErrorCodeEnum, [string, number]>>({
  [ErrorCodeEnum.InvalidConfiguration]: ['Invalid payment client configuration', 500],
  [ErrorCodeEnum.InvalidRequest]: ['Invalid payment request', 500],

  [ErrorCodeEnum.TransportFailed]: ['Merchant backend unreachable', 500],
  [ErrorCodeEnum.BackendRejected]: ['Merchant backend rejected the request', 500],
  [ErrorCodeEnum.MalformedResponse]: ['Malformed merchant backend response', 500],

  [ErrorCodeEnum.SignatureInvalid]: ['Invalid signature', 400],
  [ErrorCodeEnum.MalformedPayload]: ['Invalid JSON payload', 400],
});
