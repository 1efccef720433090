/**
 * Transport-level failure codes for requests sent to the external viewer
 */
export enum ViewerTransportErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  CONNECTION_REFUSED = 'connection_refused',
  CONNECTION_RESET = 'connection_reset',
  DNS_LOOKUP_FAILED = 'dns_lookup_failed',
  HOST_UNREACHABLE = 'host_unreachable',
  REQUEST_TIMEOUT = 'request_timeout',
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  SERVER_ERROR = 'server_error',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Error describing why a forward attempt to the viewer failed.
 *
 * The forwarder never throws these across its boundary; they classify the
 * failure for the event log. Every failure is retried the same way.
 */
export class ViewerTransportError extends Error {
  public readonly code: ViewerTransportErrorCode;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: ViewerTransportErrorCode = ViewerTransportErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ViewerTransportError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ViewerTransportError.prototype);
  }

  /**
   * @returns JSON object containing error details for the event log
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static connectionFailed(m: string, c?: Error): ViewerTransportError {
    return new ViewerTransportError(
      `Connection failed: ${m}`,
      ViewerTransportErrorCode.CONNECTION_FAILED,
      c,
    );
  }

  public static connectionRefused(
    h: string,
    p?: number,
    c?: Error,
  ): ViewerTransportError {
    const loc = p ? `${h}:${p}` : h;
    return new ViewerTransportError(
      `Connection refused to ${loc}`,
      ViewerTransportErrorCode.CONNECTION_REFUSED,
      c,
    );
  }

  public static connectionReset(c?: Error): ViewerTransportError {
    return new ViewerTransportError(
      'Connection was reset by peer',
      ViewerTransportErrorCode.CONNECTION_RESET,
      c,
    );
  }

  public static dnsLookupFailed(h: string, c?: Error): ViewerTransportError {
    return new ViewerTransportError(
      `DNS lookup failed for ${h}`,
      ViewerTransportErrorCode.DNS_LOOKUP_FAILED,
      c,
    );
  }

  public static hostUnreachable(h: string, c?: Error): ViewerTransportError {
    return new ViewerTransportError(
      `Host ${h} is unreachable`,
      ViewerTransportErrorCode.HOST_UNREACHABLE,
      c,
    );
  }

  public static fromHttpStatus(s: number, t?: string): ViewerTransportError {
    const msg = t ? `HTTP ${s}: ${t}` : `HTTP ${s}`;

    if (s === 404) {
      return new ViewerTransportError(msg, ViewerTransportErrorCode.NOT_FOUND);
    }
    if (s === 408) {
      return new ViewerTransportError(msg, ViewerTransportErrorCode.REQUEST_TIMEOUT);
    }
    if (s === 503) {
      return new ViewerTransportError(
        msg,
        ViewerTransportErrorCode.SERVICE_UNAVAILABLE,
      );
    }
    if (s >= 500 && s < 600) {
      return new ViewerTransportError(msg, ViewerTransportErrorCode.SERVER_ERROR);
    }
    if (s >= 400 && s < 500) {
      return new ViewerTransportError(msg, ViewerTransportErrorCode.BAD_REQUEST);
    }
    return new ViewerTransportError(msg, ViewerTransportErrorCode.UNKNOWN_ERROR);
  }

  /**
   * Classifies an error thrown by `fetch` (undici wraps the socket error in
   * `cause`) against the endpoint it was sent to.
   */
  public static fromNetworkError(
    error: unknown,
    host: string,
    port: number,
  ): ViewerTransportError {
    const err = error instanceof Error ? error : new Error(String(error));
    const code = networkErrorCode(err);

    switch (code) {
      case 'ECONNREFUSED':
        return ViewerTransportError.connectionRefused(host, port, err);
      case 'ECONNRESET':
        return ViewerTransportError.connectionReset(err);
      case 'ENOTFOUND':
      case 'EAI_AGAIN':
        return ViewerTransportError.dnsLookupFailed(host, err);
      case 'EHOSTUNREACH':
      case 'ENETUNREACH':
        return ViewerTransportError.hostUnreachable(host, err);
      default:
        return ViewerTransportError.connectionFailed(err.message, err);
    }
  }
}

function networkErrorCode(error: Error): string | undefined {
  for (const candidate of [error.cause, error]) {
    if (
      typeof candidate === 'object' &&
      candidate !== null &&
      'code' in candidate &&
      typeof candidate.code === 'string'
    ) {
      return candidate.code;
    }
  }
  return undefined;
}
