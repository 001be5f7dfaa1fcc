import { field } from '../schema/index.js';

import { CinderVolumeBackend } from './base.js';
import { commonBackendFields, sanCredentialFields } from './common-fields.js';

/**
 * Options of the cinder-volume-dellpowerstore charm.
 *
 * Required: `san-ip`, `san-username`, `san-password`. The protocol may be
 * left to the charm default.
 */
export const dellPowerStoreFields = {
  ...sanCredentialFields('Dell PowerStore'),
  protocol: field.enum(['fc', 'iscsi'], 'Storage protocol (fc or iscsi)'),
  ...commonBackendFields,
  driver_ssl_cert: field.string('SSL certificate content in PEM format'),
  powerstore_nvme: field.boolean('Connect over NVMe instead of the selected protocol'),
  powerstore_ports: field.string('Comma separated list of PowerStore iSCSI IPs or FC WWNs'),
  replication_device: field.string('Replication target settings'),
};

export function createDellPowerStoreBackend(): CinderVolumeBackend {
  return new CinderVolumeBackend({
    backendType: 'dellpowerstore',
    displayName: 'Dell PowerStore',
    fields: dellPowerStoreFields,
  });
}
