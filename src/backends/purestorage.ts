import { field, markSecret } from '../schema/index.js';

import { CinderVolumeBackend } from './base.js';
import { chapFields, commonBackendFields } from './common-fields.js';

/**
 * Options of the cinder-volume-purestorage charm (Pure Storage FlashArray).
 *
 * Required: `san-ip`, `pure-api-token`, `protocol`. FlashArray authenticates
 * with an API token instead of a username and password.
 */
export const pureStorageFields = {
  san_ip: markSecret(
    field.string('FlashArray management VIP or FQDN', { required: true, format: 'host' }),
    'san-ip'
  ),
  pure_api_token: markSecret(
    field.string('FlashArray REST API token', { required: true }),
    'pure-api-token'
  ),
  protocol: field.enum(['iscsi', 'fc', 'nvme'], 'Storage protocol (iscsi, fc or nvme)', {
    required: true,
  }),
  ...commonBackendFields,
  driver_ssl_cert: field.string('SSL certificate content in PEM format'),
  pure_iscsi_cidr: field.string('CIDR of FlashArray iSCSI targets hosts may connect to'),
  pure_nvme_cidr: field.string('CIDR of FlashArray NVMe targets hosts may connect to'),
  pure_nvme_transport: field.enum(['roce', 'tcp'], 'NVMe transport (roce or tcp)'),
  pure_host_personality: field.enum(
    ['aix', 'esxi', 'hitachi-vsp', 'hpux', 'oracle-vm-server', 'solaris', 'vms'],
    'Host personality applied to hosts created on the array'
  ),
  pure_automatic_max_oversubscription_ratio: field.boolean(
    'Derive the oversubscription ratio from the array'
  ),
  pure_eradicate_on_delete: field.boolean('Eradicate volumes immediately on delete'),
  ...chapFields,
};

export function createPureStorageBackend(): CinderVolumeBackend {
  return new CinderVolumeBackend({
    backendType: 'purestorage',
    displayName: 'Pure Storage FlashArray',
    fields: pureStorageFields,
  });
}
