import type { DeviceDescriptor } from '../../types/audit.types';

export interface DirectoryIdentity {
  externalId: string;
  name: string;
}

/**
 * A single failed directory call. `status` is the HTTP status when the
 * directory answered; `code` is a socket/timeout code or MALFORMED_RESPONSE.
 */
export class DirectoryRequestError extends Error {
  readonly status?: number;
  readonly code?: string;

  constructor(message: string, opts: { status?: number; code?: string } = {}) {
    super(message);
    this.name = 'DirectoryRequestError';
    this.status = opts.status;
    this.code = opts.code;
  }
}

export const MALFORMED_RESPONSE = 'MALFORMED_RESPONSE';

/**
 * Raw access to the external asset directory. Implementations make a single
 * attempt per call; retry and error mapping live in DirectoryQueryService.
 *
 * `lookupUser` resolves to null when the directory has no such user.
 */
export interface DirectoryPort {
  lookupUser(lookupName: string): Promise<DirectoryIdentity | null>;
  listAssetsByOwner(externalId: string): Promise<DeviceDescriptor[]>;
}
