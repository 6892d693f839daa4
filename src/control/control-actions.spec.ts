import { InvalidRequestError } from '../acquisition/errors/device-api.error';
import {
  CONTROL_ACTIONS,
  isControlActionName,
  renderScheduleEntry,
} from './control-actions';
import { findWritableParam, renderParamValue, WRITABLE_PARAMS } from './writable-params';

describe('control actions', () => {
  describe('setpoint modes', () => {
    it('should render only the flags that were given', () => {
      expect(CONTROL_ACTIONS.grid_charge.render({ setpoint: 3000, maxSoc: 90 })).toEqual([
        'sched_set 3 -s 3000 --max 90',
      ]);
      expect(CONTROL_ACTIONS.inverter_discharge.render({})).toEqual(['sched_set 2']);
      expect(
        CONTROL_ACTIONS.full_solar_export.render({ setpoint: 0, minSoc: 20, maxSoc: 80 }),
      ).toEqual(['sched_set 9 -s 0 --min 20 --max 80']);
    });

    it('should map each action to its control mode', () => {
      const modes = (
        [
          'inverter_charge',
          'inverter_discharge',
          'grid_charge',
          'grid_discharge',
          'solar_charge',
          'full_solar_export',
        ] as const
      ).map((name) => CONTROL_ACTIONS[name].render({})[0]);

      expect(modes).toEqual([
        'sched_set 1',
        'sched_set 2',
        'sched_set 3',
        'sched_set 4',
        'sched_set 7',
        'sched_set 9',
      ]);
    });

    it('should reject out-of-range values', () => {
      expect(() => CONTROL_ACTIONS.grid_charge.render({ maxSoc: 101 })).toThrow(
        InvalidRequestError,
      );
      expect(() => CONTROL_ACTIONS.grid_charge.render({ setpoint: -5 })).toThrow(
        InvalidRequestError,
      );
      expect(() => CONTROL_ACTIONS.grid_charge.render({ setpoint: 1.5 })).toThrow(
        InvalidRequestError,
      );
    });

    it('should reject unknown fields', () => {
      expect(() => CONTROL_ACTIONS.grid_charge.render({ power: 100 })).toThrow(
        InvalidRequestError,
      );
    });
  });

  describe('charge/discharge modes', () => {
    it('should render separate charge and discharge setpoints', () => {
      expect(
        CONTROL_ACTIONS.solar_charge_discharge.render({
          chargeSetpoint: 2000,
          dischargeSetpoint: 1000,
          minSoc: 10,
        }),
      ).toEqual(['sched_set 8 -c 2000 -d 1000 --min 10']);
    });

    it('should require a setpoint for grid charge/discharge', () => {
      expect(() => CONTROL_ACTIONS.grid_charge_discharge.render({})).toThrow(
        'Invalid request: setpoint: Required',
      );
      expect(CONTROL_ACTIONS.grid_charge_discharge.render({ setpoint: 500 })).toEqual([
        'sched_set 5 -s 500',
      ]);
    });
  });

  describe('idle', () => {
    it('should add --offline when asked', () => {
      expect(CONTROL_ACTIONS.idle.render(undefined)).toEqual(['sched_set 0']);
      expect(CONTROL_ACTIONS.idle.render({ offline: true })).toEqual([
        'sched_set 0 --offline',
      ]);
    });
  });

  describe('schedule_replace', () => {
    it('should set the first entry and add the rest', () => {
      const commands = CONTROL_ACTIONS.schedule_replace.render({
        entries: [
          {
            type: 3,
            from: '2025-03-01T12:00:00+02:00',
            to: '2025-03-01T11:00:00Z',
            setpoint: 3000,
          },
          { type: 0, from: '2025-03-01T11:00:00.500Z' },
        ],
      });

      expect(commands).toEqual([
        'sched_set 3 --from 2025-03-01T10:00:00Z --to 2025-03-01T11:00:00Z -s 3000',
        'sched_add 0 --from 2025-03-01T11:00:00Z',
      ]);
    });

    it('should reject an empty list', () => {
      expect(() => CONTROL_ACTIONS.schedule_replace.render({ entries: [] })).toThrow(
        'Invalid request: entries: Schedule entries list cannot be empty',
      );
    });

    it('should reject unknown control modes', () => {
      expect(() =>
        CONTROL_ACTIONS.schedule_replace.render({ entries: [{ type: 12 }] }),
      ).toThrow(InvalidRequestError);
    });

    it('should reject timestamps without a zone', () => {
      expect(() =>
        CONTROL_ACTIONS.schedule_replace.render({
          entries: [{ type: 3, from: '2025-03-01 10:00' }],
        }),
      ).toThrow(InvalidRequestError);
    });
  });

  describe('renderScheduleEntry', () => {
    it('should emit every limit flag in a fixed order', () => {
      expect(
        renderScheduleEntry({
          type: 5,
          minSoc: 10,
          maxSoc: 90,
          setpoint: 1000,
          maxCharge: 2000,
          maxDischarge: 3000,
          importLimit: 4000,
          exportLimit: 5000,
        }),
      ).toBe('5 --min 10 --max 90 -s 1000 -c 2000 -d 3000 -l 4000 -x 5000');
    });
  });

  describe('other actions', () => {
    it('should clear the schedule', () => {
      expect(CONTROL_ACTIONS.schedule_clear.render({})).toEqual(['sched_clear']);
    });

    it('should reboot without requiring local mode', () => {
      expect(CONTROL_ACTIONS.reboot.render(undefined)).toEqual(['reset_hard']);
      expect(CONTROL_ACTIONS.reboot.requiresLocalMode).toBe(false);
      expect(CONTROL_ACTIONS.schedule_clear.requiresLocalMode).toBe(true);
    });

    it('should recognise action names', () => {
      expect(isControlActionName('grid_charge')).toBe(true);
      expect(isControlActionName('frequency_reserve')).toBe(false);
    });
  });
});

describe('writable params', () => {
  it('should render numbers within their range', () => {
    expect(renderParamValue(WRITABLE_PARAMS.ecu_main_fuse_size_a, { value: 25 })).toBe('25');
    expect(() =>
      renderParamValue(WRITABLE_PARAMS.ecu_main_fuse_size_a, { value: 101 }),
    ).toThrow(InvalidRequestError);
  });

  it('should accept only listed options', () => {
    expect(renderParamValue(WRITABLE_PARAMS.ledstrip_mode, { value: 'soc' })).toBe('soc');
    expect(() =>
      renderParamValue(WRITABLE_PARAMS.ledstrip_mode, { value: 'rainbow' }),
    ).toThrow(InvalidRequestError);
  });

  it('should render switches as true/false', () => {
    expect(renderParamValue(WRITABLE_PARAMS.settings_local, { value: true })).toBe('true');
    expect(renderParamValue(WRITABLE_PARAMS.ota_enable, { value: false })).toBe('false');
    expect(() =>
      renderParamValue(WRITABLE_PARAMS.settings_local, { value: 'yes' }),
    ).toThrow(InvalidRequestError);
  });

  it('should not find inherited or unknown names', () => {
    expect(findWritableParam('toString')).toBeUndefined();
    expect(findWritableParam('ecu_id')).toBeUndefined();
    expect(findWritableParam('ledstrip_mode')).toEqual({
      kind: 'select',
      options: ['unset', 'off', 'on', 'soc', 'dem', 'ser'],
    });
  });
});
