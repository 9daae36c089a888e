import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import {
  RequestTrackerDirectory,
  UNKNOWN_FIELD,
  createDirectoryHttpClient,
  extractUserId,
} from '../../../adapters/directory/request-tracker.directory';
import { DirectoryRequestError, MALFORMED_RESPONSE } from '../../../services/ports/directory.port';
import { isTransientError } from '../../../services/retry.service';
import { testConfig } from '../../test-utils/factories';
import { captureError } from '../../test-utils/capture-error';

type Responder = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { config, status, statusText: String(status), headers: {}, data };
}

/** Directory client over a stubbed axios adapter; records every request. */
function directoryWith(responder: Responder) {
  const requests: InternalAxiosRequestConfig[] = [];
  const config = testConfig({ RT_URL: 'http://rt.test/', RT_TOKEN: 'test-secret' }).directory;
  const http = createDirectoryHttpClient(config, async (request) => {
    requests.push(request);
    const { status, data } = responder(request);
    const response = respond(request, status, data);
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, request, null, response);
    }
    return response;
  });
  return { directory: new RequestTrackerDirectory(config, http), requests };
}

describe('RequestTrackerDirectory', () => {
  describe('lookupUser', () => {
    it('reads the numeric id from the self hyperlink', async () => {
      const { directory, requests } = directoryWith(() => ({
        status: 200,
        data: {
          id: 'jlee',
          Name: 'jlee',
          _hyperlinks: [
            { ref: 'memberships', type: 'group', id: 7 },
            { ref: 'self', type: 'user', id: 42, _url: 'http://rt.test/REST/2.0/user/42' },
          ],
        },
      }));

      await expect(directory.lookupUser('jlee')).resolves.toEqual({ externalId: '42', name: 'jlee' });
      expect(requests[0].baseURL).toBe('http://rt.test/REST/2.0');
      expect(requests[0].url).toBe('/user/jlee');
      expect(requests[0].method).toBe('get');
      expect(requests[0].headers.get('Authorization')).toBe('token test-secret');
    });

    it('encodes names with spaces', async () => {
      const { directory, requests } = directoryWith(() => ({ status: 200, data: { id: 'A Kim' } }));

      await expect(directory.lookupUser('A Kim')).resolves.toEqual({ externalId: 'A Kim', name: 'A Kim' });
      expect(requests[0].url).toBe('/user/A%20Kim');
    });

    it('returns null for a 404', async () => {
      const { directory } = directoryWith(() => ({ status: 404, data: { message: 'No user' } }));
      await expect(directory.lookupUser('nobody')).resolves.toBeNull();
    });

    it('reports a server error with its status', async () => {
      const { directory } = directoryWith(() => ({ status: 502, data: { message: 'Bad gateway' } }));

      const error = await captureError(() => directory.lookupUser('jlee'));

      expect(error).toBeInstanceOf(DirectoryRequestError);
      expect(error).toMatchObject({ status: 502 });
      expect(isTransientError(error)).toBe(true);
    });

    it('reports a timeout with its code', async () => {
      const config = testConfig().directory;
      const http = createDirectoryHttpClient(config, async (request) => {
        throw new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED, request);
      });
      const directory = new RequestTrackerDirectory(config, http);

      const error = await captureError(() => directory.lookupUser('jlee'));

      expect(error).toMatchObject({ name: 'DirectoryRequestError', code: 'ECONNABORTED' });
      expect(isTransientError(error)).toBe(true);
    });

    it('treats a non-object body as malformed', async () => {
      const { directory } = directoryWith(() => ({ status: 200, data: [1, 2] }));

      const error = await captureError(() => directory.lookupUser('jlee'));

      expect(error).toMatchObject({ code: MALFORMED_RESPONSE });
      expect(isTransientError(error)).toBe(false);
    });
  });

  describe('listAssetsByOwner', () => {
    it('searches by owner and fills missing fields', async () => {
      const { directory, requests } = directoryWith(() => ({
        status: 200,
        data: {
          page: 1,
          pages: 1,
          items: [
            { id: 101, Name: 'TAG-101', 'CF.{Serial Number}': 'SN-101', 'CF.{Asset Type}': 'Chromebook' },
            { id: '102', Name: '  ' },
          ],
        },
      }));

      const devices = await directory.listAssetsByOwner('42');

      expect(devices).toEqual([
        { assetId: '101', assetTag: 'TAG-101', serialNumber: 'SN-101', deviceType: 'Chromebook' },
        { assetId: '102', assetTag: UNKNOWN_FIELD, serialNumber: UNKNOWN_FIELD, deviceType: UNKNOWN_FIELD },
      ]);
      expect(requests[0].method).toBe('post');
      expect(requests[0].url).toBe('/assets');
      expect(requests[0].params).toEqual({ fields: 'Name,CF.{Serial Number},CF.{Asset Type}', page: 1, per_page: 100 });
      expect(JSON.parse(String(requests[0].data))).toEqual([{ field: 'Owner', value: '42' }]);
    });

    it('follows every page', async () => {
      const { directory, requests } = directoryWith((request) => {
        const page = request.params.page;
        return { status: 200, data: { page, pages: 2, items: [{ id: `asset-${page}` }] } };
      });

      const devices = await directory.listAssetsByOwner('42');

      expect(devices.map((d) => d.assetId)).toEqual(['asset-1', 'asset-2']);
      expect(requests).toHaveLength(2);
    });

    it('treats a response without items as malformed', async () => {
      const { directory } = directoryWith(() => ({ status: 200, data: { total: 0 } }));

      const error = await captureError(() => directory.listAssetsByOwner('42'));

      expect(error).toMatchObject({ code: MALFORMED_RESPONSE });
    });

    it('treats an asset without an id as malformed', async () => {
      const { directory } = directoryWith(() => ({ status: 200, data: { pages: 1, items: [{ Name: 'TAG-1' }] } }));

      const error = await captureError(() => directory.listAssetsByOwner('42'));

      expect(error).toMatchObject({ code: MALFORMED_RESPONSE, message: 'Asset entry without id' });
    });
  });
});

describe('extractUserId', () => {
  it('falls back to the top-level id', () => {
    expect(extractUserId({ id: 'jlee', _hyperlinks: [{ ref: 'self', type: 'queue', id: 3 }] })).toBe('jlee');
    expect(extractUserId({})).toBeNull();
  });
});
