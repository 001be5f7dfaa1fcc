// Field groups shared by several backend schemas.

import { field, markSecret } from '../schema/index.js';

/**
 * Management address and credentials of a SAN array. All three are required
 * and stored in the backend secret under their wire keys.
 */
export function sanCredentialFields(product: string) {
  return {
    san_ip: markSecret(
      field.string(`${product} management IP or FQDN`, { required: true, format: 'host' }),
      'san-ip'
    ),
    san_username: markSecret(
      field.string(`${product} management username`, { required: true }),
      'san-username'
    ),
    san_password: markSecret(
      field.string(`${product} management password`, { required: true }),
      'san-password'
    ),
  };
}

/** Options every cinder-volume backend charm understands */
export const commonBackendFields = {
  volume_backend_name: field.string('Name that Cinder will report for this backend'),
  backend_availability_zone: field.string('Availability zone to associate with this backend'),
};

export const chapFields = {
  use_chap_auth: field.boolean('Enable CHAP authentication for iSCSI targets'),
  chap_username: markSecret(field.string('CHAP username'), 'chap-username'),
  chap_password: markSecret(field.string('CHAP password'), 'chap-password'),
};
