import { ResourceProvisionError, toError } from '@toolscout/shared';
import type { ProvisionFailureReason } from '@toolscout/shared';

/**
 * HTTP status carried by a control-plane error, if any.
 * dockerode sets `statusCode`; @kubernetes/client-node sets `code`.
 */
export function statusCodeOf(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'statusCode' in err ? err.statusCode : 'code' in err ? err.code : undefined;
  return typeof status === 'number' ? status : null;
}

/** Node system error code (ECONNREFUSED, ENOENT, ...), if any. */
function systemCodeOf(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  return typeof err.code === 'string' ? err.code : null;
}

function reasonFor(err: unknown): ProvisionFailureReason {
  const status = statusCodeOf(err);
  if (status === 401 || status === 403) return 'forbidden';
  if (status === 404) return 'not-found';
  if (status === 409) return 'conflict';
  if (status !== null && status >= 500) return 'unavailable';

  switch (systemCodeOf(err)) {
    case 'EACCES':
    case 'EPERM':
      return 'forbidden';
    case 'ECONNREFUSED':
    case 'ENOENT':
    case 'ETIMEDOUT':
    case 'EHOSTUNREACH':
      return 'unavailable';
    default:
      return 'unknown';
  }
}

/** Wrap a control-plane failure during provisioning. */
export function toProvisionError(err: unknown, action: string): ResourceProvisionError {
  if (err instanceof ResourceProvisionError) return err;
  return new ResourceProvisionError(
    reasonFor(err),
    `${action} failed: ${toError(err).message}`,
    { cause: err },
  );
}
