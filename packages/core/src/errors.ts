import type { Tenant } from './types';

export class NotifyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single tenant's poll could not reach or read its datastore. */
export class DetectionError extends NotifyError {
  constructor(
    readonly tenant: Tenant,
    cause: unknown,
  ) {
    super(`change detection failed for ${describeTenant(tenant)}: ${messageOf(cause)}`, { cause });
  }
}

export function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function describeTenant(tenant: Tenant): string {
  return tenant === null ? 'default project' : `project "${tenant}"`;
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
