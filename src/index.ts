import 'reflect-metadata';

export * from './modules/payment/client/payment.client';
export * from './modules/payment/client/payment-client.interface';
export { resolveClientConfig } from './modules/payment/client/payment-client.config';
export * from './modules/payment/errors/payment-client.errors';
export * from './modules/payment/events/payment-events';
export * from './modules/payment/payment.constants';
export * from './modules/payment/payment.module';
export * from './modules/payment/services/payment-events.service';
export * from './modules/payment/controllers/http/webhook.controller';
export { ErrorCode, ErrorCodeEnum } from './shared/constants/error-code.constant';
export { createLogger } from './shared/logger';
