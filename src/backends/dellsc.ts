import { field, markSecret } from '../schema/index.js';

import { CinderVolumeBackend } from './base.js';
import { commonBackendFields, sanCredentialFields } from './common-fields.js';

/**
 * Options of the cinder-volume-dellsc charm (Dell Storage Center).
 *
 * Required: `san-ip`, `san-username`, `san-password`, `dell-sc-ssn`,
 * `protocol`. The secondary Data Collector credentials are secret as well.
 */
export const dellScFields = {
  ...sanCredentialFields('Dell Storage Center Data Collector'),
  dell_sc_ssn: field.string('Storage Center system serial number', { required: true }),
  protocol: field.enum(['fc', 'iscsi'], 'Storage protocol (fc or iscsi)', { required: true }),
  ...commonBackendFields,
  dell_sc_api_port: field.string('Data Collector REST API port'),
  dell_sc_server_folder: field.string('Server folder to place new server definitions'),
  dell_sc_volume_folder: field.string('Volume folder to place created volumes'),
  dell_sc_verify_cert: field.boolean('Verify the Data Collector HTTPS certificate'),
  secondary_san_ip: markSecret(
    field.string('Secondary Data Collector IP or FQDN', { format: 'host' }),
    'secondary-san-ip'
  ),
  secondary_san_username: markSecret(
    field.string('Secondary Data Collector username'),
    'secondary-san-username'
  ),
  secondary_san_password: markSecret(
    field.string('Secondary Data Collector password'),
    'secondary-san-password'
  ),
  secondary_sc_api_port: field.string('Secondary Data Collector REST API port'),
  excluded_domain_ips: field.string('Comma separated list of iSCSI IPs to exclude'),
  included_domain_ips: field.string('Comma separated list of iSCSI IPs to use exclusively'),
};

export function createDellScBackend(): CinderVolumeBackend {
  return new CinderVolumeBackend({
    backendType: 'dellsc',
    displayName: 'Dell Storage Center',
    fields: dellScFields,
  });
}
