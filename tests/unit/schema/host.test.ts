import { describe, it, expect } from 'vitest';

import { HostSchema, isIpOrFqdn } from '@/schema/host.js';

describe('isIpOrFqdn()', () => {
  it.each(['192.168.1.1', '10.0.0.254', 'fe80::1', '2001:db8::10'])('should accept IP %s', (value) => {
    expect(isIpOrFqdn(value)).toBe(true);
  });

  it.each(['array.example.com', 'array-01.storage.example.org'])(
    'should accept FQDN %s',
    (value) => {
      expect(isIpOrFqdn(value)).toBe(true);
    }
  );

  it.each(['', 'localhost', 'bad_host', '10.0.0.300', 'bad_host.example.com', '-array.example.com', 'array..com'])(
    'should reject %s',
    (value) => {
      expect(isIpOrFqdn(value)).toBe(false);
    }
  );

  it.each([42, true, null])('should reject non-string value %s', (value) => {
    expect(isIpOrFqdn(value)).toBe(false);
  });
});

describe('HostSchema', () => {
  it('should return the address unchanged', () => {
    expect(HostSchema.parse('array.example.com')).toBe('array.example.com');
    expect(HostSchema.parse('192.168.1.1')).toBe('192.168.1.1');
  });
});
