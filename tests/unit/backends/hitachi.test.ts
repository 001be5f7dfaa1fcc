import { describe, it, expect } from 'vitest';

import { createHitachiBackend } from '@/backends/hitachi.js';

import { minimalRawConfigs } from '../../helpers/fixtures.js';

describe('Hitachi backend', () => {
  const backend = createHitachiBackend();
  const schema = backend.configSchema();

  it('should identify as hitachi', () => {
    expect(backend.backendType).toBe('hitachi');
    expect(backend.deployableUnit.name).toBe('cinder-volume-hitachi');
  });

  it('should require credentials, storage id, pools and protocol', () => {
    expect(schema.requiredFields().map((f) => f.externalKeyName)).toEqual([
      'san-ip',
      'san-username',
      'san-password',
      'hitachi-storage-id',
      'hitachi-pools',
      'protocol',
    ]);
  });

  it('should keep CHAP and mirror credentials secret', () => {
    expect(schema.secretFields().map((f) => f.secretKey)).toEqual([
      'san-ip',
      'san-username',
      'san-password',
      'chap-username',
      'chap-password',
      'hitachi-mirror-rest-user',
      'hitachi-mirror-rest-password',
    ]);
  });

  it('should validate its boolean switches', () => {
    const config = schema.validate({
      ...minimalRawConfigs.hitachi,
      'hitachi-group-create': true,
      'hitachi-zoning-request': false,
    });

    expect(config.get('hitachi_group_create')).toBe(true);
    expect(config.get('hitachi_zoning_request')).toBe(false);
    expect(config.get('hitachi_group_delete')).toBeNull();
  });

  it('should skip the storage binding for FC', () => {
    const config = schema.validate(minimalRawConfigs.hitachi ?? {});

    expect(backend.endpointBindings(config)).toEqual({ '': 'management' });
  });
});
