export class StowawayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'StowawayError';
  }
}

export class ConfigError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SiteError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SITE_ERROR', details);
    this.name = 'SiteError';
  }
}

/**
 * The remote source refused access (401/403 or an explicit denial page).
 * Treated as durable: the item is recorded as restricted, never retried.
 */
export class AccessDeniedError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ACCESS_DENIED', details);
    this.name = 'AccessDeniedError';
  }
}

export class DownloadError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DOWNLOAD_ERROR', details);
    this.name = 'DownloadError';
  }
}

export class SyncError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SYNC_ERROR', details);
    this.name = 'SyncError';
  }
}

export class SessionError extends StowawayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SESSION_ERROR', details);
    this.name = 'SessionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
