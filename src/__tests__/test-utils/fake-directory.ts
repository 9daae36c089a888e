import type { DeviceDescriptor } from '../../types/audit.types';
import { DirectoryRequestError, type DirectoryIdentity, type DirectoryPort } from '../../services/ports/directory.port';

type Step<T> = { value: T } | { error: Error };

/**
 * Scripted DirectoryPort. Each call consumes the next scripted step for that
 * operation; once the script is empty the fallback answer is returned.
 */
export class FakeDirectory implements DirectoryPort {
  readonly users = new Map<string, DirectoryIdentity>();
  readonly assets = new Map<string, DeviceDescriptor[]>();
  readonly calls: Array<{ operation: 'lookupUser' | 'listAssetsByOwner'; arg: string }> = [];

  private readonly userScript: Array<Step<DirectoryIdentity | null>> = [];
  private readonly assetScript: Array<Step<DeviceDescriptor[]>> = [];

  addUser(lookupName: string, externalId: string, devices: DeviceDescriptor[] = []): this {
    this.users.set(lookupName, { externalId, name: lookupName });
    this.assets.set(externalId, devices);
    return this;
  }

  failLookup(...errors: Error[]): this {
    this.userScript.push(...errors.map((error) => ({ error })));
    return this;
  }

  failAssets(...errors: Error[]): this {
    this.assetScript.push(...errors.map((error) => ({ error })));
    return this;
  }

  async lookupUser(lookupName: string): Promise<DirectoryIdentity | null> {
    this.calls.push({ operation: 'lookupUser', arg: lookupName });
    const step = this.userScript.shift();
    if (step) {
      if ('error' in step) throw step.error;
      return step.value;
    }
    return this.users.get(lookupName) ?? null;
  }

  async listAssetsByOwner(externalId: string): Promise<DeviceDescriptor[]> {
    this.calls.push({ operation: 'listAssetsByOwner', arg: externalId });
    const step = this.assetScript.shift();
    if (step) {
      if ('error' in step) throw step.error;
      return step.value;
    }
    return (this.assets.get(externalId) ?? []).map((d) => ({ ...d }));
  }
}

export function transientError(status = 503): DirectoryRequestError {
  return new DirectoryRequestError(`Request failed with status code ${status}`, { status });
}

export function connectionReset(): DirectoryRequestError {
  return new DirectoryRequestError('socket hang up', { code: 'ECONNRESET' });
}
