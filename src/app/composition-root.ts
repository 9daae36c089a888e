import type { DbPort } from '../services/ports/db.port';
import type { AuditRepositoryPort } from '../services/ports/audit.repository.port';
import type { DirectoryPort } from '../services/ports/directory.port';
import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import { createDbAuditRepository } from '../adapters/repositories/db-audit.repository';
import { RequestTrackerDirectory } from '../adapters/directory/request-tracker.directory';
import { DirectoryQueryService } from '../services/directory-query.service';
import { RosterImportService } from '../services/roster-import.service';
import { AuditSessionService } from '../services/audit-session.service';
import { VerificationService } from '../services/verification.service';
import { NotesLedgerService } from '../services/notes-ledger.service';
import { ReauditService } from '../services/reaudit.service';
import { RetentionService } from '../services/retention.service';
import { getAuditConfig, type AuditConfig } from '../config/audit.config';
import { logger } from '../utils/logger';

export interface AuditServices {
  rosterImport: RosterImportService;
  sessions: AuditSessionService;
  verification: VerificationService;
  notes: NotesLedgerService;
  reaudit: ReauditService;
  retention: RetentionService;
}

export interface CompositionOverrides {
  config?: AuditConfig;
  db?: DbPort;
  repository?: AuditRepositoryPort;
  directory?: DirectoryPort;
}

/** Wires the services over a repository and directory port. */
export function buildAuditServices(
  config: AuditConfig,
  repository: AuditRepositoryPort,
  directory: DirectoryPort,
  clock?: () => Date
): AuditServices {
  const directoryQuery = new DirectoryQueryService(directory, {
    maxAttempts: config.directory.maxAttempts,
    baseDelay: config.directory.baseDelayMs,
  });
  return {
    rosterImport: new RosterImportService(repository, { maxRows: config.roster.maxRows }),
    sessions: new AuditSessionService(repository),
    verification: new VerificationService(repository, directoryQuery, { noteMaxLength: config.notes.maxLength, now: clock }),
    notes: new NotesLedgerService(repository),
    reaudit: new ReauditService(repository),
    retention: new RetentionService(repository, config.retention.defaultDays),
  };
}

export class CompositionRoot {
  private readonly _config: AuditConfig;
  private readonly _dbPort: DbPort;
  private readonly _repository: AuditRepositoryPort;
  private readonly _directory: DirectoryPort;
  private _services: AuditServices | null = null;

  constructor(overrides: CompositionOverrides = {}) {
    this._config = overrides.config ?? getAuditConfig();
    this._dbPort = overrides.db ?? createPostgresDbAdapter(this._config.db);
    this._repository = overrides.repository ?? createDbAuditRepository(this._dbPort);
    this._directory = overrides.directory ?? new RequestTrackerDirectory(this._config.directory);
    logger.debug('composition-root-initialized', {
      directoryUrl: this._config.directory.baseUrl,
      directoryAttempts: this._config.directory.maxAttempts,
    });
  }

  getConfig(): AuditConfig {
    return this._config;
  }

  getDbPort(): DbPort {
    return this._dbPort;
  }

  getAuditRepository(): AuditRepositoryPort {
    return this._repository;
  }

  getServices(): AuditServices {
    if (!this._services) {
      this._services = buildAuditServices(this._config, this._repository, this._directory);
    }
    return this._services;
  }
}

let composition: CompositionRoot | null = null;

export function getCompositionRoot(): CompositionRoot {
  if (!composition) composition = new CompositionRoot();
  return composition;
}
