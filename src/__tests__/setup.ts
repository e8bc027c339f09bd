import 'reflect-metadata';

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error'; // Reduce noise in test output
process.env.TALER_MERCHANT_BACKEND_URL = 'https://merchant.example.com';
process.env.TALER_MERCHANT_API_KEY = 'test_api_key';
process.env.TALER_DEFAULT_CURRENCY = 'EUR';
process.env.TALER_WEBHOOK_SECRET = 'test-secret';
process.env.TALER_REQUEST_TIMEOUT_MS = '5000';
delete process.env.LOG_DIR;
