import { vi } from 'vitest';

import type { Config } from '@/config/index.js';

/** Logger stand-in whose calls can be inspected */
export function createMockLogger() {
  const log = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    silent: vi.fn(),
    child: vi.fn(),
    level: 'info',
    msgPrefix: '',
  };
  log.child.mockReturnValue(log);
  return log;
}

/** Minimal valid raw config per built-in backend (wire keys, placeholder credentials) */
export const minimalRawConfigs: Record<string, Record<string, unknown>> = {
  hitachi: {
    'san-ip': '192.168.1.10',
    'san-username': 'admin',
    'san-password': 'test-secret',
    'hitachi-storage-id': '800000012345',
    'hitachi-pools': 'pool-a',
    protocol: 'fc',
  },
  purestorage: {
    'san-ip': 'flasharray.example.com',
    'pure-api-token': 'test-token',
    protocol: 'iscsi',
  },
  dellsc: {
    'san-ip': '192.168.1.20',
    'san-username': 'admin',
    'san-password': 'test-secret',
    'dell-sc-ssn': '64702',
    protocol: 'iscsi',
  },
  dellpowerstore: {
    'san-ip': '192.168.1.1',
    'san-username': 'admin',
    'san-password': 'secret',
  },
};

export const testConfig: Config = {
  server: { host: '127.0.0.1', port: 0 },
  logging: { level: 'error', pretty: false },
  rateLimit: { global: 100, windowMs: 60000 },
  env: 'test',
  deployment: { engine: 'memory', outputDir: './data/plans' },
  network: { managementSpace: 'mgmt', storageSpace: 'san' },
};
