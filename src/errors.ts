/** Zone state on the provider does not match what was read before the change */
export class ZoneStateError extends Error {
  override name = 'ZoneStateError';
  constructor(public readonly reason: string) {
    super(`Zone state on the provider does not match the expected state: ${reason}`);
  }
}

export function isZoneStateError(err: unknown): err is ZoneStateError {
  return err instanceof ZoneStateError;
}

/** A writer was used after its single commit */
export class WriterStateError extends Error {
  override name = 'WriterStateError';
}

export class LockFailureError extends Error {
  override name = 'LockFailureError';
  constructor() {
    super('Lock failure');
  }
}

/** Non-2xx answer from a JSON API */
export class HttpError extends Error {
  override name = 'HttpError';
  constructor(
    public readonly clientName: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
  ) {
    super(`HTTP ${status} ${statusText} from ${clientName}: ${body}`);
  }

  /** The response body as JSON, or null if it wasn't JSON */
  json(): unknown {
    try {
      return JSON.parse(this.body);
    } catch {
      return null;
    }
  }
}
