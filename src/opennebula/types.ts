/**
 * OpenNebula Types
 *
 * The read operations the inventory needs from oned and the error codes
 * oned reports alongside failed calls.
 */

import type { RawObject } from '../core/types.js';

/**
 * oned error codes (third element of a failed reply)
 */
export const ONE_ERROR_CODES = {
  SUCCESS: 0x0000,
  AUTHENTICATION: 0x0100,
  AUTHORIZATION: 0x0200,
  NO_EXISTS: 0x0400,
  ACTION: 0x0800,
  XML_RPC_API: 0x1000,
  INTERNAL: 0x2000,
  ALLOCATE: 0x4000,
  LOCKED: 0x8000,
} as const;

/**
 * Read operations used by the inventory.
 *
 * Lookups reject with NotFoundError when the object does not exist and with
 * RemoteFailureError for anything else.
 */
export interface OneApi {
  /** `one.vmpool.infoextended`: every VM element in the pool */
  vmPoolInfoExtended(): Promise<RawObject[]>;
  /** `one.template.info`: the VMTEMPLATE element */
  templateInfo(id: number): Promise<RawObject>;
  /** `one.vn.info`: the VNET element */
  vnInfo(id: number): Promise<RawObject>;
}
