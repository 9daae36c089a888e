import type { AuditRepositoryPort } from './ports/audit.repository.port';
import type { DirectoryQueryService } from './directory-query.service';
import type {
  AuditPerson,
  DeviceDescriptor,
  VerificationPass,
  VerificationResult,
} from '../types/audit.types';
import { ConflictError, IncompleteVerificationError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getCounter } from '../utils/metrics';

const submissions = getCounter(
  'device_audit_verification_submissions_total',
  'Verification submissions by outcome',
  ['outcome']
);

export interface SubmitVerificationInput {
  fetchedDevices: DeviceDescriptor[];
  confirmedDeviceIds: string[];
  note?: string | null;
  auditor: string;
}

export interface VerificationOptions {
  noteMaxLength: number;
  now?: () => Date;
}

/** Name the directory knows the person by. */
export function lookupNameFor(person: Pick<AuditPerson, 'username' | 'name'>): string {
  return person.username.trim() || person.name.trim();
}

export function missingConfirmations(fetched: DeviceDescriptor[], confirmedIds: string[]): string[] {
  const confirmed = new Set(confirmedIds);
  return fetched.map((d) => d.assetId).filter((id) => !confirmed.has(id));
}

/**
 * Drives one person through fetch → confirm → submit. Nothing is written
 * until submit, and submit either writes everything or nothing.
 */
export class VerificationService {
  private readonly now: () => Date;

  constructor(
    private readonly repository: AuditRepositoryPort,
    private readonly directory: DirectoryQueryService,
    private readonly options: VerificationOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async beginVerification(personId: string): Promise<VerificationPass> {
    const person = await this.requirePerson(personId);
    const identity = await this.directory.resolveIdentity(lookupNameFor(person));
    const devices = await this.directory.fetchAssignedDevices(identity.externalId);
    logger.info('verification-started', { personId, externalId: identity.externalId, deviceCount: devices.length });
    return { personId, externalId: identity.externalId, devices, fetchedAt: this.now() };
  }

  async submitVerification(personId: string, input: SubmitVerificationInput): Promise<VerificationResult> {
    const person = await this.requirePerson(personId);
    if (person.audited) {
      throw this.alreadyAudited(person);
    }

    const missingDeviceIds = missingConfirmations(input.fetchedDevices, input.confirmedDeviceIds);
    if (missingDeviceIds.length > 0) {
      submissions.inc({ outcome: 'incomplete' });
      throw new IncompleteVerificationError('Every fetched device must be confirmed', {
        expected: input.fetchedDevices.map((d) => d.assetId),
        confirmed: input.confirmedDeviceIds,
        missingDeviceIds,
      });
    }

    const note = input.note?.trim() || null;
    if (note && note.length > this.options.noteMaxLength) {
      throw new ValidationError(`Note exceeds ${this.options.noteMaxLength} characters`, {
        maxLength: this.options.noteMaxLength,
        length: note.length,
      });
    }

    const auditedAt = this.now();
    const result = await this.repository.completeAudit({
      personId,
      auditor: input.auditor,
      auditedAt,
      devices: input.fetchedDevices,
      note,
    });

    if (!result.claimed) {
      submissions.inc({ outcome: 'conflict' });
      logger.warn('verification-conflict', { personId, auditor: input.auditor });
      throw this.alreadyAudited(result.current ?? person);
    }

    const outcome = input.fetchedDevices.length === 0 ? 'no-devices' : 'verified';
    submissions.inc({ outcome });
    logger.info('verification-submitted', {
      personId,
      sessionId: person.sessionId,
      auditor: input.auditor,
      outcome,
      deviceCount: result.deviceRecords.length,
      noteRecorded: result.note !== null,
    });

    return {
      personId,
      outcome,
      auditedAt,
      auditor: input.auditor,
      deviceRecordCount: result.deviceRecords.length,
      noteRecorded: result.note !== null,
    };
  }

  private async requirePerson(personId: string): Promise<AuditPerson> {
    const person = await this.repository.getPerson(personId);
    if (!person) {
      throw new NotFoundError('Person not found', { personId });
    }
    return person;
  }

  private alreadyAudited(person: AuditPerson): ConflictError {
    const auditedBy = person.auditorIdentity ?? 'another auditor';
    return new ConflictError(`Person already audited by ${auditedBy}`, {
      personId: person.id,
      auditedBy: person.auditorIdentity,
      auditedAt: person.auditTimestamp ? person.auditTimestamp.toISOString() : null,
    });
  }
}
