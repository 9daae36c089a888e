import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { AuditConfig } from '../../config/audit.config';
import type { DeviceDescriptor } from '../../types/audit.types';
import {
  DirectoryRequestError,
  MALFORMED_RESPONSE,
  type DirectoryIdentity,
  type DirectoryPort,
} from '../../services/ports/directory.port';

type DirectoryConfig = AuditConfig['directory'];

export const UNKNOWN_FIELD = 'Unknown';

const ASSET_FIELDS = ['Name', 'CF.{Serial Number}', 'CF.{Asset Type}'];
const PAGE_SIZE = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * REST2 returns the numeric user id only inside `_hyperlinks`; the top-level
 * `id` is usually the login name, so it is the fallback.
 */
export function extractUserId(body: Record<string, unknown>): string | null {
  const links = body._hyperlinks;
  if (Array.isArray(links)) {
    for (const link of links) {
      if (isRecord(link) && link.ref === 'self' && link.type === 'user') {
        const id = stringField(link, 'id');
        if (id) return id;
      }
    }
  }
  return stringField(body, 'id');
}

export function toDeviceDescriptor(item: Record<string, unknown>): DeviceDescriptor {
  const assetId = stringField(item, 'id');
  if (!assetId) {
    throw new DirectoryRequestError('Asset entry without id', { code: MALFORMED_RESPONSE });
  }
  return {
    assetId,
    assetTag: stringField(item, 'Name') ?? UNKNOWN_FIELD,
    serialNumber: stringField(item, 'CF.{Serial Number}') ?? UNKNOWN_FIELD,
    deviceType: stringField(item, 'CF.{Asset Type}') ?? UNKNOWN_FIELD,
  };
}

function toDirectoryError(error: unknown): DirectoryRequestError {
  if (error instanceof DirectoryRequestError) return error;
  if (axios.isAxiosError(error)) {
    return new DirectoryRequestError(error.message, { status: error.response?.status, code: error.code });
  }
  return new DirectoryRequestError(error instanceof Error ? error.message : String(error));
}

export function createDirectoryHttpClient(config: DirectoryConfig, adapter?: AxiosAdapter): AxiosInstance {
  return axios.create({
    baseURL: `${config.baseUrl}${config.apiEndpoint}`,
    timeout: config.timeoutMs,
    headers: {
      Authorization: `token ${config.token}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    ...(adapter ? { adapter } : {}),
  });
}

/**
 * Request Tracker REST2 client. One HTTP attempt per call.
 */
export class RequestTrackerDirectory implements DirectoryPort {
  private readonly http: AxiosInstance;

  constructor(config: DirectoryConfig, http?: AxiosInstance) {
    this.http = http ?? createDirectoryHttpClient(config);
  }

  async lookupUser(lookupName: string): Promise<DirectoryIdentity | null> {
    try {
      const response = await this.http.get<unknown>(`/user/${encodeURIComponent(lookupName)}`);
      const body: unknown = response.data;
      if (!isRecord(body)) {
        throw new DirectoryRequestError('User response is not an object', { code: MALFORMED_RESPONSE });
      }
      const externalId = extractUserId(body);
      if (!externalId) {
        throw new DirectoryRequestError('User response carries no id', { code: MALFORMED_RESPONSE });
      }
      return { externalId, name: stringField(body, 'Name') ?? lookupName };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw toDirectoryError(error);
    }
  }

  async listAssetsByOwner(externalId: string): Promise<DeviceDescriptor[]> {
    const devices: DeviceDescriptor[] = [];
    let page = 1;
    let pages = 1;
    try {
      do {
        const response = await this.http.post<unknown>('/assets', [{ field: 'Owner', value: externalId }], {
          params: { fields: ASSET_FIELDS.join(','), page, per_page: PAGE_SIZE },
        });
        const body: unknown = response.data;
        if (!isRecord(body) || !Array.isArray(body.items)) {
          throw new DirectoryRequestError('Asset search response has no items', { code: MALFORMED_RESPONSE });
        }
        for (const item of body.items) {
          if (!isRecord(item)) {
            throw new DirectoryRequestError('Asset entry is not an object', { code: MALFORMED_RESPONSE });
          }
          devices.push(toDeviceDescriptor(item));
        }
        pages = typeof body.pages === 'number' ? body.pages : page;
        page += 1;
      } while (page <= pages);
    } catch (error) {
      throw toDirectoryError(error);
    }
    return devices;
  }
}
