import { discordRateLimiter, polymarketRateLimiter } from '../utils/RateLimiter';

// Global test setup
beforeAll(() => {
  process.env.NODE_ENV = 'test';
  process.env.LOG_LEVEL = 'error'; // Reduce log noise in tests
});

afterAll(() => {
  // Shared limiters hold a cleanup interval
  discordRateLimiter.destroy();
  polymarketRateLimiter.destroy();
});

// Mock console methods to reduce test output noise
const originalConsoleLog = console.log;
const originalConsoleWarn = console.warn;
const originalConsoleError = console.error;

beforeEach(() => {
  if (!process.env.DEBUG) {
    console.log = jest.fn();
    console.warn = jest.fn();
    console.error = jest.fn();
  }
});

afterEach(() => {
  if (!process.env.DEBUG) {
    console.log = originalConsoleLog;
    console.warn = originalConsoleWarn;
    console.error = originalConsoleError;
  }

  jest.clearAllMocks();
});
