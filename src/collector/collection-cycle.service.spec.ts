/**
 * Unit tests for collection-cycle.service.ts
 */
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { Point } from '@influxdata/influxdb-client';
import { CollectionCycleService } from './collection-cycle.service';
import { FroniusApi, FroniusClient, FroniusTransportError } from '../fronius';
import { InfluxService, SinkConfigurationError } from '../influx';
import {
  createMockFroniusApi,
  mockHealthySite,
} from '../../test/utils/mock-fronius-api';

const ALL_PIPELINES = [
  'inverter_data',
  'inverter_phase_data',
  'inverter_info',
  'meter_data',
  'storage_data',
  'ohm_pilot_data',
  'power_flow_data',
];

describe('CollectionCycleService', () => {
  let service: CollectionCycleService;
  let froniusApi: jest.Mocked<FroniusApi>;
  let write: jest.Mock<Promise<void>, [string, Point[]]>;
  let resolveDestination: jest.Mock;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    froniusApi = createMockFroniusApi();
    mockHealthySite(froniusApi);
    write = jest.fn().mockResolvedValue(undefined);
    resolveDestination = jest.fn().mockReturnValue({
      url: 'http://localhost:8086',
      org: 'home',
      token: 'test-token',
      bucket: 'solar',
    });

    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CollectionCycleService,
        { provide: FroniusClient, useValue: froniusApi },
        {
          provide: InfluxService,
          useValue: {
            resolveDestination,
            openSink: jest.fn().mockReturnValue({ write }),
          },
        },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((_key: string, defaultValue?: unknown) => defaultValue),
          },
        },
      ],
    }).compile();

    service = module.get<CollectionCycleService>(CollectionCycleService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write every metric of a healthy site in pipeline order', async () => {
    const report = await service.runCycle();

    expect(report.written).toEqual(ALL_PIPELINES);
    expect(report.collectFailed).toEqual([]);
    expect(report.writeFailed).toEqual([]);
    expect(write).toHaveBeenCalledTimes(7);
    expect(write.mock.calls.map(([bucket]) => bucket)).toEqual(
      Array(7).fill('solar'),
    );
    expect(write.mock.calls.map(([, points]) => points.length)).toEqual(
      Array(7).fill(1),
    );
    expect(write.mock.calls[0][1][0].toLineProtocol()).toMatch(
      /^inverter,device=Inverter ac_current=2\.4,/,
    );
  });

  it('should query devices with the default ids', async () => {
    await service.runCycle();

    expect(froniusApi.getInverterInfo).toHaveBeenCalledTimes(1);
    expect(
      froniusApi.getInverterRealtimeData.mock.calls.map(([id]) => id.value),
    ).toEqual([1, 1]);
    expect(froniusApi.getMeterRealtimeData.mock.calls[0][0].value).toBe(0);
    expect(froniusApi.getStorageRealtimeData.mock.calls[0][0].value).toBe(0);
    expect(froniusApi.getOhmPilotRealtimeData.mock.calls[0][0].value).toBe(0);
  });

  it('should skip a metric that cannot be collected', async () => {
    froniusApi.getMeterRealtimeData.mockRejectedValue(
      new FroniusTransportError('GetMeterRealtimeData.cgi', 'HTTP 500', 500),
    );

    const report = await service.runCycle();

    expect(report.collectFailed).toEqual(['meter_data']);
    expect(report.written).toEqual(
      ALL_PIPELINES.filter((name) => name !== 'meter_data'),
    );
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to collect meter_data: [GetMeterRealtimeData.cgi] HTTP 500',
    );
  });

  it('should keep writing after a failed write', async () => {
    write
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error('timeout'));

    const report = await service.runCycle();

    expect(report.writeFailed).toEqual(['meter_data']);
    expect(report.written).toEqual(
      ALL_PIPELINES.filter((name) => name !== 'meter_data'),
    );
    expect(write).toHaveBeenCalledTimes(7);
    expect(errorSpy).toHaveBeenCalledWith('Failed to write meter_data: timeout');
  });

  it('should complete a cycle in which nothing could be collected', async () => {
    const unreachable = new FroniusTransportError(
      'GetPowerFlowRealtimeData.fcgi',
      'Request failed: fetch failed',
    );
    froniusApi.getInverterRealtimeData.mockRejectedValue(unreachable);
    froniusApi.getInverterInfo.mockRejectedValue(unreachable);
    froniusApi.getMeterRealtimeData.mockRejectedValue(unreachable);
    froniusApi.getStorageRealtimeData.mockRejectedValue(unreachable);
    froniusApi.getOhmPilotRealtimeData.mockRejectedValue(unreachable);
    froniusApi.getPowerFlowRealtimeData.mockRejectedValue(unreachable);

    const report = await service.runCycle();

    expect(report.collectFailed).toEqual(ALL_PIPELINES);
    expect(report.written).toEqual([]);
    expect(write).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(7);
  });

  it('should fail the cycle when the destination is not configured', async () => {
    resolveDestination.mockImplementation(() => {
      throw new SinkConfigurationError(['INFLUX_DB_URL']);
    });

    await expect(service.runCycle()).rejects.toThrow(SinkConfigurationError);
    expect(write).not.toHaveBeenCalled();
  });

  it('should not write an inverter that reports no channels', async () => {
    froniusApi.getInverterRealtimeData.mockResolvedValue({});

    const report = await service.runCycle();

    expect(report.collectFailed).toEqual([
      'inverter_data',
      'inverter_phase_data',
    ]);
    expect(report.written).toEqual(ALL_PIPELINES.slice(2));
    expect(write).toHaveBeenCalledTimes(5);
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to collect inverter_data: [inverter] No fields reported',
    );
    expect(errorSpy).toHaveBeenCalledWith(
      'Failed to collect inverter_phase_data: [inverter_phase] No fields reported',
    );
  });

  it('should count a value that cannot be encoded as a collect failure', async () => {
    froniusApi.getOhmPilotRealtimeData.mockResolvedValue({
      CodeOfState: 1,
      CodeOfError: 2.5,
      PowerReal_PAC_Sum: 0,
      Temperature_Channel_1: 40,
    });

    const report = await service.runCycle();

    expect(report.collectFailed).toEqual(['ohm_pilot_data']);
    expect(errorSpy).toHaveBeenCalledWith(
      "Failed to collect ohm_pilot_data: [ohm_pilot] Field 'error_code' cannot be stored: 2.5",
    );
  });
});
