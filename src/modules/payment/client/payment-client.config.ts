import { ConfigurationError } from '../errors/payment-client.errors';
import { DEFAULT_CURRENCY, DEFAULT_REQUEST_TIMEOUT_MS } from '../payment.constants';
import { ClientConfig, ClientConfigInput } from './payment-client.interface';

const CURRENCY_PATTERN = /^[A-Z][A-Z0-9]{2,10}$/;

const parseBaseUrl = (value: string | URL): URL => {
  let url: URL;
  try {
    url = new URL(value.toString());
  } catch {
    throw new ConfigurationError(`Invalid merchant backend URL: ${value.toString()}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`Unsupported merchant backend URL protocol: ${url.protocol}`);
  }

  // Request paths are resolved relative to the base path
  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }
  url.search = '';
  url.hash = '';

  return url;
};

export const isValidCurrency = (currency: string): boolean => CURRENCY_PATTERN.test(currency);

export const resolveClientConfig = (input: ClientConfigInput): ClientConfig => {
  const backendBaseUrl = parseBaseUrl(input.backendBaseUrl);

  const apiKey = input.apiKey.trim();
  if (!apiKey) {
    throw new ConfigurationError('Merchant API key is required');
  }

  const defaultCurrency = input.defaultCurrency || DEFAULT_CURRENCY;
  if (!isValidCurrency(defaultCurrency)) {
    throw new ConfigurationError(`Invalid default currency: ${defaultCurrency}`);
  }

  const timeoutMs = input.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`Request timeout must be a positive integer, got ${timeoutMs}`);
  }

  return Object.freeze({
    backendBaseUrl,
    apiKey,
    defaultCurrency,
    webhookSecret: input.webhookSecret || undefined,
    timeoutMs,
  });
};
