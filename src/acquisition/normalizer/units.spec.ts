import {
  centiToUnit,
  controlModeName,
  deciToUnit,
  epochSecondsToUtcIso,
  isRepresentableEpochSeconds,
  isTruthyFlag,
  milliToUnit,
  msToDays,
  toScheduleMode,
  toUtcIso,
  unwrapParam,
  whToKwh,
} from './units';

describe('units', () => {
  describe('scaled conversions', () => {
    it('should divide deci, centi and milli values exactly', () => {
      expect(deciToUnit(253)).toBe(25.3);
      expect(centiToUnit(7550)).toBe(75.5);
      expect(milliToUnit(50020)).toBe(50.02);
    });

    it('should convert Wh to kWh', () => {
      expect(whToKwh(123456)).toBe(123.456);
    });

    it('should convert milliseconds to days', () => {
      expect(msToDays(86_400_000)).toBe(1);
      expect(msToDays(43_200_000)).toBe(0.5);
    });
  });

  describe('unwrapParam', () => {
    it('should unwrap single-element arrays', () => {
      expect(unwrapParam([true])).toBe(true);
      expect(unwrapParam([123])).toBe(123);
      expect(unwrapParam(['on'])).toBe('on');
    });

    it('should pass scalars through unchanged', () => {
      expect(unwrapParam('x')).toBe('x');
      expect(unwrapParam(0)).toBe(0);
      expect(unwrapParam(false)).toBe(false);
    });

    it('should return undefined when there is no scalar to unwrap', () => {
      expect(unwrapParam([])).toBeUndefined();
      expect(unwrapParam([{ nested: 1 }])).toBeUndefined();
      expect(unwrapParam(null)).toBeUndefined();
    });

    it('should take the first element of longer arrays', () => {
      expect(unwrapParam([7, 8])).toBe(7);
    });
  });

  describe('control modes', () => {
    it('should name every known code', () => {
      expect(controlModeName(0)).toBe('idle');
      expect(controlModeName(3)).toBe('grid_charge');
      expect(controlModeName(6)).toBe('frequency_reserve');
      expect(controlModeName(9)).toBe('full_solar_export');
    });

    it('should fall back to "unknown" outside the table', () => {
      expect(controlModeName(10)).toBe('unknown');
      expect(controlModeName(-1)).toBe('unknown');
    });

    it('should map local_mode to a schedule mode', () => {
      expect(toScheduleMode(true)).toBe('local');
      expect(toScheduleMode(false)).toBe('remote');
    });
  });

  describe('timestamps', () => {
    it('should render UTC without milliseconds', () => {
      expect(toUtcIso(new Date('2025-03-01T10:00:00.123Z'))).toBe(
        '2025-03-01T10:00:00Z',
      );
    });

    it('should convert epoch seconds', () => {
      expect(epochSecondsToUtcIso(1740823200)).toBe('2025-03-01T10:00:00Z');
    });

    it('should accept epochs up to the limits of Date', () => {
      expect(isRepresentableEpochSeconds(8.64e12)).toBe(true);
      expect(isRepresentableEpochSeconds(-8.64e12)).toBe(true);
      expect(isRepresentableEpochSeconds(8.64e12 + 1)).toBe(false);
      expect(isRepresentableEpochSeconds(Number.NaN)).toBe(false);
    });
  });

  describe('isTruthyFlag', () => {
    it.each([true, 'true', 1, '1'])('should accept %p', (value) => {
      expect(isTruthyFlag(value)).toBe(true);
    });

    it.each([false, 'false', 0, '0', undefined])('should reject %p', (value) => {
      expect(isTruthyFlag(value)).toBe(false);
    });
  });
});
