import { describe, it, expect, beforeEach, vi } from 'vitest';

import { CinderVolumeBackend, assertInstanceName } from '@/backends/base.js';
import { createDellPowerStoreBackend } from '@/backends/dellpowerstore.js';
import { createHitachiBackend } from '@/backends/hitachi.js';
import type { DeploymentEngine, LifecycleContext } from '@/backends/types.js';
import { MemoryDeploymentEngine } from '@/deploy/memory-engine.js';
import { MemorySecretStore } from '@/deploy/memory-secret-store.js';
import { field } from '@/schema/fields.js';
import { ValidatedConfig } from '@/schema/validated-config.js';

import { createMockLogger, minimalRawConfigs } from '../../helpers/fixtures.js';

const credentials = {
  'san-ip': '192.168.1.1',
  'san-username': 'admin',
  'san-password': 'test-secret',
};

describe('CinderVolumeBackend', () => {
  let backend: CinderVolumeBackend;

  beforeEach(() => {
    backend = createDellPowerStoreBackend();
  });

  describe('endpointBindings()', () => {
    it('should bind storage when no protocol is set', () => {
      const config = backend.configSchema().validate(credentials);

      expect(backend.endpointBindings(config)).toEqual({ '': 'management', storage: 'storage' });
    });

    it('should only bind the default space for FC', () => {
      const config = backend.configSchema().validate({ ...credentials, protocol: 'fc' });

      expect(backend.endpointBindings(config)).toEqual({ '': 'management' });
    });
  });

  describe('buildDeploymentVariables()', () => {
    it('should pass plain options by wire key and reference secrets', () => {
      const config = backend
        .configSchema()
        .validate({ ...credentials, protocol: 'iscsi', powerstore_nvme: true });

      const variables = backend.buildDeploymentVariables(config, {
        instanceName: 'ps-primary',
        secretRef: 'secret:test-ref',
      });

      expect(variables).toEqual({
        charm_name: 'cinder-volume-dellpowerstore',
        charm_channel: '2025.1/edge',
        charm_revision: null,
        charm_base: 'ubuntu@24.04',
        endpoint_bindings: { '': 'management', storage: 'storage' },
        charm_config: {
          'volume-backend-name': 'ps-primary',
          protocol: 'iscsi',
          'powerstore-nvme': true,
        },
        secret_ref: 'secret:test-ref',
      });
    });

    it('should never inline secret values', () => {
      const config = backend.configSchema().validate(credentials);
      const variables = backend.buildDeploymentVariables(config, {
        instanceName: 'ps-primary',
        secretRef: 'secret:test-ref',
      });

      expect(Object.keys(variables.charm_config)).toEqual(['volume-backend-name']);
    });

    it('should let volume_backend_name override the instance name', () => {
      const config = backend
        .configSchema()
        .validate({ ...credentials, 'volume-backend-name': 'powerstore-gold' });
      const variables = backend.buildDeploymentVariables(config, {
        instanceName: 'ps-primary',
        secretRef: 'secret:test-ref',
      });

      expect(variables.charm_config['volume-backend-name']).toBe('powerstore-gold');
    });

    it('should use the supplied network spaces', () => {
      const config = backend.configSchema().validate(credentials);
      const variables = backend.buildDeploymentVariables(config, {
        instanceName: 'ps-primary',
        secretRef: 'secret:test-ref',
        spaces: { management: 'mgmt', storage: 'san' },
      });

      expect(variables.endpoint_bindings).toEqual({ '': 'mgmt', storage: 'san' });
    });

    it('should refuse secret values without a reference', () => {
      const config = backend.configSchema().validate(credentials);

      expect(() =>
        backend.buildDeploymentVariables(config, { instanceName: 'ps-primary', secretRef: null })
      ).toThrow('Backend dellpowerstore has secret values but no secret reference');
    });

    it('should drop the reference when no secret is set', () => {
      const plain = new CinderVolumeBackend({
        backendType: 'plainarray',
        displayName: 'Plain Array',
        fields: { protocol: field.enum(['fc', 'iscsi'], 'Protocol') },
      });
      const config = plain.configSchema().validate({ protocol: 'fc' });

      expect(
        plain.buildDeploymentVariables(config, { instanceName: 'plain', secretRef: 'secret:unused' })
          .secret_ref
      ).toBeNull();
    });

    it('should reject a config that did not come from schema validation', () => {
      const forged: ValidatedConfig = Object.create(ValidatedConfig.prototype);

      expect(() =>
        backend.buildDeploymentVariables(forged, { instanceName: 'ps', secretRef: 'secret:test-ref' })
      ).toThrow('Configuration for dellpowerstore was not produced by schema validation');
      expect(() => backend.endpointBindings(forged)).toThrow(
        'Configuration for dellpowerstore was not produced by schema validation'
      );
    });

    it("should reject another backend's config", () => {
      const hitachiConfig = createHitachiBackend()
        .configSchema()
        .validate(minimalRawConfigs.hitachi ?? {});

      expect(() =>
        backend.buildDeploymentVariables(hitachiConfig, {
          instanceName: 'ps-primary',
          secretRef: 'secret:test-ref',
        })
      ).toThrow('Configuration validated for hitachi cannot be used with backend dellpowerstore');
    });
  });

  describe('lifecycle', () => {
    let engine: MemoryDeploymentEngine;
    let secrets: MemorySecretStore;
    let log: ReturnType<typeof createMockLogger>;
    let ctx: LifecycleContext;

    beforeEach(async () => {
      engine = new MemoryDeploymentEngine();
      secrets = new MemorySecretStore();
      log = createMockLogger();
      ctx = { engine, secrets, log };
      await backend.registerDeploymentPlan(ctx);
    });

    it('should register its plan with the deployable unit', () => {
      expect(engine.plan('storage-backend-dellpowerstore')).toEqual({
        name: 'storage-backend-dellpowerstore',
        backendType: 'dellpowerstore',
        deployableUnit: {
          name: 'cinder-volume-dellpowerstore',
          channel: '2025.1/edge',
          revision: null,
          base: 'ubuntu@24.04',
        },
      });
    });

    it('should store secrets and apply variables that reference them', async () => {
      const config = backend.configSchema().validate({ ...credentials, protocol: 'fc' });

      const variables = await backend.addBackendInstance(ctx, 'ps-primary', config);

      expect(variables.secret_ref).toMatch(/^secret:/);
      expect(secrets.resolve(variables.secret_ref ?? '')).toEqual({
        'san-ip': '192.168.1.1',
        'san-username': 'admin',
        'san-password': 'test-secret',
      });
      expect(engine.variables('storage-backend-dellpowerstore', 'ps-primary')).toEqual(variables);
    });

    it('should log the instance without secret values', async () => {
      const config = backend.configSchema().validate(credentials);
      await backend.addBackendInstance(ctx, 'ps-primary', config);

      expect(log.info).toHaveBeenCalledWith(
        {
          backendType: 'dellpowerstore',
          instanceName: 'ps-primary',
          charm: 'cinder-volume-dellpowerstore',
          secretKeys: ['san-ip', 'san-username', 'san-password'],
        },
        'Backend instance applied'
      );
      expect(JSON.stringify(log.info.mock.calls)).not.toContain('test-secret');
    });

    it('should remove the instance and its secret', async () => {
      const config = backend.configSchema().validate(credentials);
      await backend.addBackendInstance(ctx, 'ps-primary', config);

      await backend.removeBackend(ctx, 'ps-primary');

      expect(engine.variables('storage-backend-dellpowerstore', 'ps-primary')).toBeNull();
      expect(secrets.has('dellpowerstore-ps-primary')).toBe(false);
    });

    it('should propagate engine failures unchanged', async () => {
      const failure = new Error('plan apply failed');
      const failing: DeploymentEngine = {
        registerPlan: vi.fn().mockResolvedValue(undefined),
        apply: vi.fn().mockRejectedValue(failure),
        destroy: vi.fn().mockRejectedValue(failure),
        healthy: vi.fn().mockResolvedValue(true),
      };
      const config = backend.configSchema().validate(credentials);
      const failingCtx = { ...ctx, engine: failing };

      await expect(backend.addBackendInstance(failingCtx, 'ps-primary', config)).rejects.toBe(failure);
      await expect(backend.removeBackend(failingCtx, 'ps-primary')).rejects.toBe(failure);
      expect(log.info).not.toHaveBeenCalled();
    });

    it('should propagate secret store failures unchanged', async () => {
      const failure = new Error('secret backend unavailable');
      const failingCtx = {
        ...ctx,
        secrets: { put: vi.fn().mockRejectedValue(failure), remove: vi.fn() },
      };
      const config = backend.configSchema().validate(credentials);

      await expect(backend.addBackendInstance(failingCtx, 'ps-primary', config)).rejects.toBe(failure);
      expect(engine.variables('storage-backend-dellpowerstore', 'ps-primary')).toBeNull();
    });

    it('should reject invalid instance names before touching collaborators', async () => {
      const config = backend.configSchema().validate(credentials);

      await expect(backend.addBackendInstance(ctx, 'Bad_Name', config)).rejects.toMatchObject({
        code: 'BACKEND_INSTANCE_NAME_INVALID',
      });
      expect(secrets.has('dellpowerstore-Bad_Name')).toBe(false);
    });
  });
});

describe('assertInstanceName()', () => {
  it.each(['ps-primary', 'a', 'backend2'])('should accept %s', (name) => {
    expect(() => assertInstanceName(name)).not.toThrow();
  });

  it.each(['', 'Upper', '1starts-with-digit', 'trailing-', 'under_score', 'x'.repeat(64)])(
    'should reject %s',
    (name) => {
      expect(() => assertInstanceName(name)).toThrow('Invalid backend instance name');
    }
  );
});
