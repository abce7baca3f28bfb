import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { DeviceId } from './device-id';
import {
  FroniusDecodeError,
  FroniusProtocolError,
  FroniusTransportError,
} from './fronius.errors';
import {
  FroniusEnvelopeSchema,
  InverterDataCollection,
  InverterInfoMap,
  InverterInfoMapSchema,
  MeterRealtimeData,
  MeterRealtimeDataSchema,
  OhmPilotRealtimeData,
  OhmPilotRealtimeDataSchema,
  PowerFlowRealtimeData,
  PowerFlowRealtimeDataSchema,
  StorageRealtimeData,
  StorageRealtimeDataSchema,
} from './dto/fronius-responses';

/**
 * Query operations the collector needs from a Fronius Datamanager.
 */
export interface FroniusApi {
  getInverterRealtimeData<T>(
    deviceId: DeviceId,
    collection: InverterDataCollection<T>,
  ): Promise<T>;
  getInverterInfo(): Promise<InverterInfoMap>;
  getMeterRealtimeData(deviceId: DeviceId): Promise<MeterRealtimeData>;
  getStorageRealtimeData(deviceId: DeviceId): Promise<StorageRealtimeData>;
  getOhmPilotRealtimeData(deviceId: DeviceId): Promise<OhmPilotRealtimeData>;
  getPowerFlowRealtimeData(): Promise<PowerFlowRealtimeData>;
}

const DEFAULT_TIMEOUT_MS = 10000;

/**
 * HTTP client for the Fronius Solar API v1.
 *
 * One long-lived instance talks to the Datamanager at FRONIUS_IP. Every
 * call is a plain GET; the JSON envelope is validated, a non-zero
 * Head.Status.Code is raised as FroniusProtocolError and Body.Data is parsed
 * against the endpoint's schema.
 */
@Injectable()
export class FroniusClient implements FroniusApi {
  private readonly logger = new Logger(FroniusClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    const host = this.configService.getOrThrow<string>('FRONIUS_IP');
    this.baseUrl = `http://${host}/solar_api/v1`;
    this.timeoutMs = this.configService.get<number>(
      'FRONIUS_TIMEOUT_MS',
      DEFAULT_TIMEOUT_MS,
    );
    this.logger.log(`FroniusClient configured with base URL: ${this.baseUrl}`);
  }

  getInverterRealtimeData<T>(
    deviceId: DeviceId,
    collection: InverterDataCollection<T>,
  ): Promise<T> {
    return this.request(
      'GetInverterRealtimeData.cgi',
      {
        Scope: 'Device',
        DeviceId: deviceId.toString(),
        DataCollection: collection.name,
      },
      collection.schema,
    );
  }

  getInverterInfo(): Promise<InverterInfoMap> {
    return this.request('GetInverterInfo.cgi', {}, InverterInfoMapSchema);
  }

  getMeterRealtimeData(deviceId: DeviceId): Promise<MeterRealtimeData> {
    return this.request(
      'GetMeterRealtimeData.cgi',
      this.deviceScope(deviceId),
      MeterRealtimeDataSchema,
    );
  }

  getStorageRealtimeData(deviceId: DeviceId): Promise<StorageRealtimeData> {
    return this.request(
      'GetStorageRealtimeData.cgi',
      this.deviceScope(deviceId),
      StorageRealtimeDataSchema,
    );
  }

  getOhmPilotRealtimeData(deviceId: DeviceId): Promise<OhmPilotRealtimeData> {
    return this.request(
      'GetOhmPilotRealtimeData.cgi',
      this.deviceScope(deviceId),
      OhmPilotRealtimeDataSchema,
    );
  }

  getPowerFlowRealtimeData(): Promise<PowerFlowRealtimeData> {
    return this.request(
      'GetPowerFlowRealtimeData.fcgi',
      {},
      PowerFlowRealtimeDataSchema,
    );
  }

  private deviceScope(deviceId: DeviceId): Record<string, string> {
    return { Scope: 'Device', DeviceId: deviceId.toString() };
  }

  /**
   * GET an endpoint and return its validated Body.Data.
   *
   * @throws FroniusTransportError on network failure, timeout or HTTP error
   * @throws FroniusDecodeError if the body does not match the schema
   * @throws FroniusProtocolError if the device reports a non-zero status
   */
  private async request<T>(
    endpoint: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.baseUrl}/${endpoint}${query ? `?${query}` : ''}`;

    this.logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const cause = toError(error);
      throw new FroniusTransportError(
        endpoint,
        `Request failed: ${cause.message}`,
        undefined,
        cause,
      );
    }

    if (!response.ok) {
      throw new FroniusTransportError(
        endpoint,
        `HTTP ${response.status}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FroniusDecodeError(
        endpoint,
        'Response body is not valid JSON',
        toError(error),
      );
    }

    const envelope = FroniusEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new FroniusDecodeError(
        endpoint,
        `Unexpected response envelope: ${formatIssues(envelope.error)}`,
      );
    }

    const { Status } = envelope.data.Head;
    if (Status.Code !== 0) {
      throw new FroniusProtocolError(endpoint, Status.Code, Status.Reason ?? '');
    }

    const data = schema.safeParse(envelope.data.Body?.Data);
    if (!data.success) {
      throw new FroniusDecodeError(
        endpoint,
        `Unexpected response data: ${formatIssues(data.error)}`,
      );
    }
    return data.data;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
