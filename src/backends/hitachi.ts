import { field, markSecret } from '../schema/index.js';

import { CinderVolumeBackend } from './base.js';
import { chapFields, commonBackendFields, sanCredentialFields } from './common-fields.js';

/**
 * Options of the cinder-volume-hitachi charm (Hitachi VSP).
 *
 * Required: `san-ip`, `san-username`, `san-password`, `hitachi-storage-id`,
 * `hitachi-pools`, `protocol`.
 */
export const hitachiFields = {
  ...sanCredentialFields('Hitachi VSP'),
  hitachi_storage_id: field.string('Product number of the storage system', { required: true }),
  hitachi_pools: field.string('Comma separated list of DP pool names or IDs', { required: true }),
  protocol: field.enum(['fc', 'iscsi'], 'Storage protocol (fc or iscsi)', { required: true }),
  ...commonBackendFields,
  hitachi_target_ports: field.string('Comma separated list of controller ports for volume attachment'),
  hitachi_compute_target_ports: field.string('Controller ports used to attach volumes to compute nodes'),
  hitachi_ldev_range: field.string('Range of LDEV numbers usable by the driver'),
  hitachi_zoning_request: field.boolean('Create FC zones through the FC zone manager'),
  hitachi_group_create: field.boolean('Create host groups or iSCSI targets automatically'),
  hitachi_group_delete: field.boolean('Delete host groups or iSCSI targets that are no longer used'),
  ...chapFields,
  hitachi_mirror_storage_id: field.string('Product number of the secondary storage system'),
  hitachi_mirror_pool: field.string('Pool of the secondary storage system'),
  hitachi_mirror_rest_user: markSecret(
    field.string('Username of the secondary storage system REST API'),
    'hitachi-mirror-rest-user'
  ),
  hitachi_mirror_rest_password: markSecret(
    field.string('Password of the secondary storage system REST API'),
    'hitachi-mirror-rest-password'
  ),
};

export function createHitachiBackend(): CinderVolumeBackend {
  return new CinderVolumeBackend({
    backendType: 'hitachi',
    displayName: 'Hitachi VSP',
    fields: hitachiFields,
  });
}
