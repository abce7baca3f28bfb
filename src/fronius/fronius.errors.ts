/**
 * Base class for every failure raised by the Fronius Solar API client.
 *
 * `endpoint` is the CGI path that was queried (e.g. 'GetMeterRealtimeData.cgi').
 */
export class FroniusError extends Error {
  constructor(
    public readonly endpoint: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${endpoint}] ${message}`);
    this.name = 'FroniusError';
  }
}

/**
 * Network failure, timeout or non-2xx HTTP status.
 */
export class FroniusTransportError extends FroniusError {
  constructor(
    endpoint: string,
    message: string,
    public readonly httpStatus?: number,
    originalError?: Error,
  ) {
    super(endpoint, message, originalError);
    this.name = 'FroniusTransportError';
  }
}

/**
 * Body was not JSON or did not match the expected response shape.
 */
export class FroniusDecodeError extends FroniusError {
  constructor(endpoint: string, message: string, originalError?: Error) {
    super(endpoint, message, originalError);
    this.name = 'FroniusDecodeError';
  }
}

/**
 * Datamanager answered with a non-zero Head.Status.Code.
 */
export class FroniusProtocolError extends FroniusError {
  constructor(
    endpoint: string,
    public readonly statusCode: number,
    public readonly reason: string,
  ) {
    super(
      endpoint,
      `Device reported status ${statusCode}${reason ? `: ${reason}` : ''}`,
    );
    this.name = 'FroniusProtocolError';
  }
}

/**
 * A device id was missing from an id-keyed response map.
 */
export class FroniusLookupError extends FroniusError {
  constructor(
    endpoint: string,
    public readonly deviceId: string,
  ) {
    super(endpoint, `No entry for device id ${deviceId}`);
    this.name = 'FroniusLookupError';
  }
}
