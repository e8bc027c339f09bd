import { ErrorCode, ErrorCodeEnum } from '../../../shared/constants/error-code.constant';

export class PaymentClientError extends Error {
  constructor(
    public readonly code: ErrorCodeEnum,
    message?: string,
    options?: ErrorOptions,
  ) {
    super(message ?? ErrorCode[code][0], options);
    this.name = 'PaymentClientError';
  }

  /**
   * Status the webhook endpoint responds with when this error escapes.
   */
  get httpStatus(): number {
    return ErrorCode[this.code][1];
  }
}

export class ConfigurationError extends PaymentClientError {
  constructor(message: string) {
    super(ErrorCodeEnum.InvalidConfiguration, message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidRequestError extends PaymentClientError {
  constructor(message: string) {
    super(ErrorCodeEnum.InvalidRequest, message);
    this.name = 'InvalidRequestError';
  }
}

export class TransportError extends PaymentClientError {
  constructor(
    message: string,
    cause: unknown,
    public readonly cancelled: boolean = false,
    public readonly timedOut: boolean = false,
  ) {
    super(ErrorCodeEnum.TransportFailed, message, { cause });
    this.name = 'TransportError';
  }
}

export class BackendError extends PaymentClientError {
  constructor(
    public readonly statusCode: number,
    public readonly body: unknown,
    message: string = `Merchant backend responded with HTTP ${statusCode}`,
  ) {
    super(ErrorCodeEnum.BackendRejected, message);
    this.name = 'BackendError';
  }
}

export class MalformedResponseError extends PaymentClientError {
  constructor(
    message: string,
    public readonly body: unknown,
  ) {
    super(ErrorCodeEnum.MalformedResponse, message);
    this.name = 'MalformedResponseError';
  }
}

export class SignatureInvalidError extends PaymentClientError {
  constructor(message?: string) {
    super(ErrorCodeEnum.SignatureInvalid, message);
    this.name = 'SignatureInvalidError';
  }
}

export class MalformedPayloadError extends PaymentClientError {
  constructor(message?: string, options?: ErrorOptions) {
    super(ErrorCodeEnum.MalformedPayload, message, options);
    this.name = 'MalformedPayloadError';
  }
}
