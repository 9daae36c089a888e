import type { DeviceDescriptor } from '../types/audit.types';
import type { DirectoryIdentity, DirectoryPort } from './ports/directory.port';
import { RetryExhaustedError, RetryService, type RetryOptions } from './retry.service';
import { NotFoundError, ServiceUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getCounter } from '../utils/metrics';

const directoryCalls = getCounter(
  'device_audit_directory_calls_total',
  'Directory calls by operation and outcome',
  ['operation', 'outcome']
);

const directoryRetries = getCounter(
  'device_audit_directory_retries_total',
  'Directory call retries by operation',
  ['operation']
);

export type DirectoryRetryPolicy = Pick<RetryOptions, 'maxAttempts' | 'baseDelay'>;

/**
 * Wraps the raw directory port with the retry policy and maps failures onto
 * the audit error taxonomy. Results are never cached.
 */
export class DirectoryQueryService {
  constructor(private readonly directory: DirectoryPort, private readonly policy: DirectoryRetryPolicy) {}

  async resolveIdentity(lookupName: string): Promise<DirectoryIdentity> {
    const identity = await this.call('resolveIdentity', () => this.directory.lookupUser(lookupName));
    if (!identity) {
      directoryCalls.inc({ operation: 'resolveIdentity', outcome: 'not_found' });
      logger.info('directory-identity-not-found', { lookupName });
      throw new NotFoundError(`No directory user named "${lookupName}"`, { lookupName });
    }
    return identity;
  }

  async fetchAssignedDevices(externalId: string): Promise<DeviceDescriptor[]> {
    const devices = await this.call('fetchAssignedDevices', () => this.directory.listAssetsByOwner(externalId));
    logger.debug('directory-devices-fetched', { externalId, count: devices.length });
    return devices;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      const result = await RetryService.withRetry(fn, `directory:${operation}`, {
        maxAttempts: this.policy.maxAttempts,
        baseDelay: this.policy.baseDelay,
        onRetry: () => directoryRetries.inc({ operation }),
      });
      directoryCalls.inc({ operation, outcome: 'success' });
      return result;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        directoryCalls.inc({ operation, outcome: 'unavailable' });
        throw new ServiceUnavailableError('Directory service unavailable', {
          operation,
          attempts: error.attempts,
          reason: error.lastError instanceof Error ? error.lastError.message : String(error.lastError),
        });
      }
      directoryCalls.inc({ operation, outcome: 'failed' });
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('directory-call-failed', { operation, error: message });
      throw new ServiceUnavailableError('Directory request failed', { operation, attempts: 1, reason: message });
    }
  }
}
