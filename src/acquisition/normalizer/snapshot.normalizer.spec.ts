import { Test, TestingModule } from '@nestjs/testing';
import { flatDocs, nestedDocs, SLOT_FROM, SLOT_TO } from '../../../test/utils/mock-data';
import { MalformedDocumentError } from '../errors/device-api.error';
import type { RawDocuments } from '../interfaces/endpoint.interface';
import { NormalizeMeta, SnapshotNormalizer } from './snapshot.normalizer';

const META: NormalizeMeta = {
  fetchedAt: '2025-03-01T10:00:05.000Z',
  staleEndpoints: [],
};

function nestedRaw(overrides: RawDocuments = {}): RawDocuments {
  return {
    status: nestedDocs.status(),
    ems: nestedDocs.ems(),
    params: nestedDocs.params(),
    schedule: nestedDocs.schedule(),
    mains: nestedDocs.mains(),
    otaManifest: nestedDocs.otaManifest(),
    ...overrides,
  };
}

describe('SnapshotNormalizer', () => {
  let normalizer: SnapshotNormalizer;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [SnapshotNormalizer],
    }).compile();

    normalizer = module.get<SnapshotNormalizer>(SnapshotNormalizer);
  });

  describe('nested format', () => {
    it('should convert EMS unit values to display units', () => {
      const snapshot = normalizer.normalize(nestedRaw(), META);

      expect(snapshot.ems).toEqual([
        {
          ecuId: 'ecu-test-001',
          ecuHost: '',
          soc: 75.5,
          power: -1500,
          frequency: 50.02,
          temperature: 25.3,
          availableCapacity: 9000,
          energyProduced: 123.456,
          energyConsumed: 654.321,
          operatingState: 'running',
          batteryState: 'charging',
          firmwareVersion: '2.0.0-test',
          ratedPower: 6000,
          alarms: [],
          warnings: ['Low temperature'],
          infos: ['Info A', 'Info B'],
          alarmCount: 0,
          warningCount: 1,
          infoCount: 2,
          prediction: {
            availableChargePower: 5000,
            availableDischargePower: 6000,
            availableChargeEnergy: 3000,
            availableDischargeEnergy: 9000,
            availableInverterChargePower: 5500,
            availableInverterDischargePower: 6500,
          },
        },
      ]);
    });

    it('should normalize status, mains and links', () => {
      const snapshot = normalizer.normalize(nestedRaw(), META);

      expect(snapshot.status).toEqual({
        upTimeDays: 2,
        firmwareVersion: '1.2.3-test',
        wifi: { connected: true, ssid: 'test-network', rssi: -55 },
        lte: { connected: false, rssi: -90 },
      });
      expect(snapshot.mains).toEqual({ voltage: 231.4, frequency: 50.01 });
    });

    it('should normalize the schedule with mode names and UTC bounds', () => {
      const snapshot = normalizer.normalize(nestedRaw(), META);

      expect(snapshot.schedule).toEqual({
        localMode: true,
        mode: 'local',
        scheduleId: 'test-schedule-1',
        entries: [
          {
            type: 3,
            typeName: 'grid_charge',
            from: SLOT_FROM,
            to: SLOT_TO,
            fromUtc: '2025-03-01T10:00:00Z',
            toUtc: '2025-03-01T11:00:00Z',
            setpoint: 3000,
            maxSoc: 90,
          },
        ],
      });
    });

    it('should keep unknown control modes with their raw code', () => {
      const snapshot = normalizer.normalize(
        nestedRaw({ schedule: { local_mode: false, schedule: [{ type: 42 }] } }),
        META,
      );

      expect(snapshot.schedule.mode).toBe('remote');
      expect(snapshot.schedule.entries).toEqual([{ type: 42, typeName: 'unknown' }]);
    });

    it('should unwrap params and skip empty values', () => {
      const snapshot = normalizer.normalize(nestedRaw(), META);

      expect(snapshot.params).toEqual({
        ecu_mdns_instance_name: 'Test Battery',
        settings_local: true,
        ecu_main_fuse_size_a: 25,
        ledstrip_mode: 'soc',
      });
      expect(snapshot.deviceName).toBe('Test Battery');
      expect(snapshot.otaVersion).toBe('2.1.0-test');
    });

    it('should materialize only the reported external sensors', () => {
      const snapshot = normalizer.normalize(nestedRaw(), META);

      expect(snapshot.sensors).toEqual([
        {
          kind: 'grid',
          power: 1200,
          energyImported: 42.5,
          energyExported: 3.25,
          rssi: -60,
        },
      ]);
    });

    it('should use bms_data SOC when the EMS average is missing', () => {
      const unit = nestedDocs.emsUnit({
        ems_data: { power: 0 },
        bms_data: [{ soc: 80 }],
      });
      const snapshot = normalizer.normalize(
        nestedRaw({ ems: nestedDocs.ems([unit]) }),
        META,
      );

      expect(snapshot.ems[0].soc).toBe(80);
    });

    it('should mark the device leader when it reports several units', () => {
      const snapshot = normalizer.normalize(
        nestedRaw({
          ems: {
            ems: [nestedDocs.emsUnit(), nestedDocs.emsUnit({ ecu_host: '10.0.0.9' })],
            aggregated: { ems_data: { soc_avg: 5000, power: -3000 } },
          },
        }),
        META,
      );

      expect(snapshot.role).toBe('leader');
      expect(snapshot.ems).toHaveLength(2);
      expect(snapshot.aggregated).toEqual({ soc: 50, power: -3000 });
    });
  });

  describe('flat format', () => {
    it('should read the flat field names', () => {
      const snapshot = normalizer.normalize(
        nestedRaw({ ems: flatDocs.ems(), params: flatDocs.params() }),
        META,
      );

      expect(snapshot.ems).toEqual([
        {
          ecuId: 'flat-ecu',
          soc: 64,
          power: 2500,
          frequency: 49.98,
          operatingState: 'idle',
        },
      ]);
      expect(snapshot.role).toBe('follower');
      expect(snapshot.params).toEqual({
        ecu_mdns_instance_name: 'Flat Battery',
        settings_local: false,
      });
    });

    it('should build sensors from top-level power fields', () => {
      const snapshot = normalizer.normalize(nestedRaw({ ems: flatDocs.ems() }), META);

      expect(snapshot.sensors).toEqual([
        { kind: 'grid', power: 800 },
        { kind: 'solar', power: 0 },
      ]);
    });
  });

  describe('optional data', () => {
    it('should omit fields the device did not report', () => {
      const unit = nestedDocs.emsUnit({ ems_data: { power: 100 } });
      const snapshot = normalizer.normalize(
        nestedRaw({ ems: { ems: [unit] }, mains: undefined, otaManifest: undefined }),
        META,
      );

      expect('soc' in snapshot.ems[0]).toBe(false);
      expect('alarmCount' in snapshot.ems[0]).toBe(false);
      expect('mains' in snapshot).toBe(false);
      expect('otaVersion' in snapshot).toBe(false);
      expect(snapshot.sensors).toEqual([]);
    });

    it('should treat null sections as absent', () => {
      const snapshot = normalizer.normalize(
        nestedRaw({
          status: { ...nestedDocs.status(), up_time: null, wifi_status: null },
          ems: {
            ems: [nestedDocs.emsUnit({ ems_prediction: null })],
            aggregated: null,
            sensors: null,
          },
          schedule: {
            local_mode: true,
            schedule_id: null,
            schedule: [{ type: 0, from: null, to: null }],
          },
        }),
        META,
      );

      expect('upTimeDays' in snapshot.status).toBe(false);
      expect('wifi' in snapshot.status).toBe(false);
      expect(snapshot.status.firmwareVersion).toBe('1.2.3-test');
      expect('prediction' in snapshot.ems[0]).toBe(false);
      expect(snapshot.ems[0].soc).toBe(75.5);
      expect(snapshot.sensors).toEqual([]);
      expect(snapshot.schedule.entries).toEqual([{ type: 0, typeName: 'idle' }]);
    });

    it('should drop schedule bounds outside the representable date range', () => {
      const snapshot = normalizer.normalize(
        nestedRaw({
          schedule: { local_mode: true, schedule: [{ type: 3, from: 1e13, to: SLOT_TO }] },
        }),
        META,
      );

      expect(snapshot.schedule.entries).toEqual([
        { type: 3, typeName: 'grid_charge', to: SLOT_TO, toUtc: '2025-03-01T11:00:00Z' },
      ]);
    });

    it('should ignore an optional document with an unexpected shape', () => {
      const snapshot = normalizer.normalize(nestedRaw({ mains: 'offline' }), META);

      expect('mains' in snapshot).toBe(false);
    });
  });

  describe('structure errors', () => {
    it('should reject a missing required document', () => {
      expect(() => normalizer.normalize(nestedRaw({ params: undefined }), META)).toThrow(
        new MalformedDocumentError('/params.json', '$', 'document missing'),
      );
    });

    it('should name the offending path', () => {
      let caught: unknown;
      try {
        normalizer.normalize(nestedRaw({ schedule: { schedule: 'soon' } }), META);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedDocumentError);
      expect(caught).toMatchObject({
        endpoint: '/schedule.json',
        fieldPath: 'schedule',
      });
    });

    it('should reject a schedule entry without a numeric type', () => {
      expect(() =>
        normalizer.normalize(
          nestedRaw({ schedule: { local_mode: true, schedule: [{ type: 'charge' }] } }),
          META,
        ),
      ).toThrow(MalformedDocumentError);
    });
  });

  describe('purity', () => {
    it('should produce equal snapshots for equal input', () => {
      const first = normalizer.normalize(nestedRaw(), META);
      const second = normalizer.normalize(nestedRaw(), META);

      expect(second).toEqual(first);
    });

    it('should freeze the snapshot deeply', () => {
      const snapshot = normalizer.normalize(nestedRaw(), META);

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.ems[0])).toBe(true);
      expect(Object.isFrozen(snapshot.schedule.entries)).toBe(true);
    });

    it('should carry stale endpoints from the meta', () => {
      const snapshot = normalizer.normalize(nestedRaw(), {
        ...META,
        staleEndpoints: ['ems'],
      });

      expect(snapshot.stale).toBe(true);
      expect(snapshot.staleEndpoints).toEqual(['ems']);
      expect(snapshot.fetchedAt).toBe(META.fetchedAt);
    });
  });
});
