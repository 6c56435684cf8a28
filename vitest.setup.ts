/**
 * Vitest Setup File
 * Configures global test environment for all tests
 */

import { vi } from 'vitest';

// ============================================================================
// Environment Configuration
// ============================================================================

process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.SEQUENCE_MAX_RETRIES = '3';
process.env.SEQUENCE_RETRY_DELAY_MS = '1';
process.env.INVENTORY_MAX_RETRIES = '3';
process.env.REFUND_WINDOW_DAYS = '30';

// ============================================================================
// Global Mocks
// ============================================================================

// Mock Sentry
vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  captureMessage: vi.fn(),
  addBreadcrumb: vi.fn(),
  startSpan: vi.fn((_options: unknown, callback: () => unknown) => callback()),
  metrics: {
    increment: vi.fn(),
    distribution: vi.fn(),
    gauge: vi.fn(),
  },
}));
