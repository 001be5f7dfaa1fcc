import { describe, it, expect } from 'vitest';

import { createDellScBackend } from '@/backends/dellsc.js';

import { minimalRawConfigs } from '../../helpers/fixtures.js';

describe('Dell Storage Center backend', () => {
  const backend = createDellScBackend();
  const schema = backend.configSchema();

  it('should identify as dellsc', () => {
    expect(backend.backendType).toBe('dellsc');
    expect(backend.displayName.toLowerCase()).toContain('dell');
    expect(backend.deployableUnit.name).toBe('cinder-volume-dellsc');
  });

  it('should require credentials, serial number and protocol', () => {
    expect(schema.requiredFields().map((f) => f.externalKeyName)).toEqual([
      'san-ip',
      'san-username',
      'san-password',
      'dell-sc-ssn',
      'protocol',
    ]);
  });

  it('should keep the secondary Data Collector credentials secret', () => {
    expect(schema.field('secondary_san_ip')?.isSecret).toBe(true);
    expect(schema.field('secondary_san_username')?.isSecret).toBe(true);
    expect(schema.field('secondary_san_password')?.isSecret).toBe(true);
    expect(schema.field('secondary_sc_api_port')?.isSecret).toBe(false);
  });

  it('should validate the secondary address format', () => {
    const result = schema.safeValidate({
      ...minimalRawConfigs.dellsc,
      'secondary-san-ip': 'not-a-host',
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.field)).toEqual(['secondary_san_ip']);
  });

  it('should bind the storage space for iSCSI', () => {
    const config = schema.validate(minimalRawConfigs.dellsc ?? {});

    expect(backend.endpointBindings(config, { management: 'mgmt', storage: 'san' })).toEqual({
      '': 'mgmt',
      storage: 'san',
    });
  });
});
