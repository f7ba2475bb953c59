import { ulid } from 'ulidx';

export type IdPrefix = 'esc_' | 'tx_' | 'pi_' | 'PSK_' | 'REL_' | 'RFD_';

/**
 * Prefixed, time-sortable identifier, e.g. `esc_01HZX3...`.
 */
export function newId(prefix: IdPrefix): string {
  return `${prefix}${ulid()}`;
}
