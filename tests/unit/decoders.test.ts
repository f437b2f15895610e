import { describe, it, expect } from 'vitest';
import {
  VITAL_DECODERS,
  decodeBatteryLevel,
  decodeBloodPressure,
  decodeHeartRate,
  decodeOxygenSaturation,
  decodeTemperature,
  ieee11073ToNumber,
  readSfloat,
  roundToTenth,
  unpackFloat,
  unpackSfloat,
  type DecodeResult
} from '../../src/decoders.js';
import { DecodeError } from '../../src/errors.js';
import { ServiceKind } from '../../src/types.js';

function valueOf<T>(result: DecodeResult<T>): T {
  if (!result.ok) {
    throw new Error(`expected a value, got: ${result.error.message}`);
  }
  return result.value;
}

function encodeFloat(mantissa: number, exponent: number): number {
  return (((exponent & 0xFF) << 24) | (mantissa & 0xFFFFFF)) >>> 0;
}

function encodeSfloat(mantissa: number, exponent: number): number {
  return ((exponent & 0x0F) << 12) | (mantissa & 0x0FFF);
}

function errorOf<T>(result: DecodeResult<T>): DecodeError {
  if (result.ok) {
    throw new Error(`expected an error, got: ${JSON.stringify(result.value)}`);
  }
  return result.error;
}

describe('IEEE-11073 number formats', () => {
  it('should sign-extend a 24-bit FLOAT mantissa and 8-bit exponent', () => {
    // mantissa 0xFFFED4 = -300, exponent 0xFF = -1
    expect(valueOf(unpackFloat(0xFFFFFED4))).toEqual({ mantissa: -300, exponent: -1 });
  });

  it('should keep positive FLOAT parts unchanged', () => {
    expect(valueOf(unpackFloat(0xFF00016E))).toEqual({ mantissa: 366, exponent: -1 });
    expect(valueOf(unpackFloat(0x02000005))).toEqual({ mantissa: 5, exponent: 2 });
  });

  it('should sign-extend a 12-bit SFLOAT mantissa and 4-bit exponent', () => {
    expect(valueOf(unpackSfloat(0x1FF8))).toEqual({ mantissa: -8, exponent: 1 });
    expect(valueOf(unpackSfloat(0xF0A0))).toEqual({ mantissa: 160, exponent: -1 });
  });

  it('should reject special values when the exponent is zero', () => {
    expect(errorOf(unpackFloat(0x007FFFFF)).message).toBe('FLOAT special value: NaN');
    expect(errorOf(unpackFloat(0x00800000)).message).toBe('FLOAT special value: NRes');
    expect(errorOf(unpackSfloat(0x07FE)).message).toBe('SFLOAT special value: +INFINITY');
    expect(errorOf(unpackSfloat(0x0802)).message).toBe('SFLOAT special value: -INFINITY');
  });

  it('should treat the special bit patterns as ordinary numbers under a non-zero exponent', () => {
    expect(valueOf(unpackSfloat(0x17FF))).toEqual({ mantissa: 2047, exponent: 1 });
  });

  describe('round trips', () => {
    const floatParts: Array<[number, number]> = [
      [-(2 ** 23), -128],
      [-(2 ** 23), 127],
      [-(2 ** 23), 1],
      [2 ** 23 - 3, -128],
      [2 ** 23 - 3, 127],
      [2 ** 23 - 3, 0],
      [-(2 ** 23 - 3), 0],
      [-1, 0],
      [0, 0],
      [366, -1]
    ];

    it.each(floatParts)('should unpack FLOAT mantissa %i exponent %i to the same parts', (mantissa, exponent) => {
      expect(valueOf(unpackFloat(encodeFloat(mantissa, exponent)))).toEqual({ mantissa, exponent });
    });

    const sfloatParts: Array<[number, number]> = [
      [-2048, -8],
      [-2048, 7],
      [-2048, 1],
      [2045, -8],
      [2045, 7],
      [2045, 0],
      [-2045, 0],
      [-1, 0],
      [0, 0],
      [120, 0]
    ];

    it.each(sfloatParts)('should unpack SFLOAT mantissa %i exponent %i to the same parts', (mantissa, exponent) => {
      expect(valueOf(unpackSfloat(encodeSfloat(mantissa, exponent)))).toEqual({ mantissa, exponent });
    });

    const specials: Array<[number, string]> = [
      [2 ** 23 - 1, 'NaN'],
      [-(2 ** 23), 'NRes'],
      [2 ** 23 - 2, '+INFINITY'],
      [-(2 ** 23 - 2), '-INFINITY'],
      [-(2 ** 23 - 1), 'reserved value']
    ];

    it.each(specials)('should refuse FLOAT mantissa %i with a zero exponent as %s', (mantissa, name) => {
      expect(errorOf(unpackFloat(encodeFloat(mantissa, 0))).message).toBe(`FLOAT special value: ${name}`);
    });

    const sfloatSpecials: Array<[number, string]> = [
      [2047, 'NaN'],
      [-2048, 'NRes'],
      [2046, '+INFINITY'],
      [-2046, '-INFINITY'],
      [-2047, 'reserved value']
    ];

    it.each(sfloatSpecials)('should refuse SFLOAT mantissa %i with a zero exponent as %s', (mantissa, name) => {
      expect(errorOf(unpackSfloat(encodeSfloat(mantissa, 0))).message).toBe(`SFLOAT special value: ${name}`);
    });
  });

  it('should scale by powers of ten', () => {
    expect(ieee11073ToNumber({ mantissa: -300, exponent: -1 })).toBe(-30);
    expect(ieee11073ToNumber({ mantissa: 12, exponent: 2 })).toBe(1200);
    expect(ieee11073ToNumber({ mantissa: 120, exponent: 0 })).toBe(120);
  });

  it('should read an SFLOAT little-endian at an offset', () => {
    expect(valueOf(readSfloat(new Uint8Array([0x00, 0x78, 0x00]), 1))).toBe(120);
    expect(valueOf(readSfloat(new Uint8Array([0xF8, 0x1F]), 0))).toBe(-80);
  });

  it('should read from a view into a larger buffer', () => {
    const backing = new Uint8Array([0xAA, 0xAA, 0x78, 0x00]);
    const view = backing.subarray(2);
    expect(valueOf(readSfloat(view, 0))).toBe(120);
  });
});

describe('decodeHeartRate', () => {
  it('should decode an 8-bit value', () => {
    expect(valueOf(decodeHeartRate(new Uint8Array([0x00, 72])))).toBe(72);
  });

  it('should decode a 16-bit little-endian value when flag bit 0 is set', () => {
    expect(valueOf(decodeHeartRate(new Uint8Array([0x01, 0x2C, 0x01])))).toBe(300);
  });

  it('should decode a 16-bit value that fits in a byte', () => {
    expect(valueOf(decodeHeartRate(new Uint8Array([0x01, 0xE8, 0x00])))).toBe(232);
  });

  it('should ignore trailing energy and RR-interval fields', () => {
    expect(valueOf(decodeHeartRate(new Uint8Array([0x10, 64, 0x20, 0x03])))).toBe(64);
  });

  it('should reject a truncated 16-bit payload', () => {
    expect(errorOf(decodeHeartRate(new Uint8Array([0x01, 0x2C]))).message).toBe(
      'Heart rate (16-bit) payload too short: 2 byte(s), need 3 [01 2C]'
    );
  });

  it('should reject an empty payload', () => {
    expect(errorOf(decodeHeartRate(new Uint8Array([]))).message).toBe(
      'Heart rate payload too short: 0 byte(s), need 2 []'
    );
  });

  it('should reject reserved flag bits', () => {
    expect(errorOf(decodeHeartRate(new Uint8Array([0x20, 72]))).message).toBe(
      'Heart rate flags 0x20 set reserved bits'
    );
  });
});

describe('decodeTemperature', () => {
  it('should convert a negative Celsius FLOAT to Fahrenheit', () => {
    // -300 x 10^-1 = -30.0 C
    expect(valueOf(decodeTemperature(new Uint8Array([0x00, 0xD4, 0xFE, 0xFF, 0xFF])))).toBe(-22);
  });

  it('should round body temperature to one decimal', () => {
    // 366 x 10^-1 = 36.6 C = 97.88 F
    expect(valueOf(decodeTemperature(new Uint8Array([0x00, 0x6E, 0x01, 0x00, 0xFF])))).toBe(97.9);
  });

  it('should round exact halves to the even tenth', () => {
    // 3625 x 10^-2 = 36.25 C = 97.25 F exactly
    expect(valueOf(decodeTemperature(new Uint8Array([0x00, 0x29, 0x0E, 0x00, 0xFE])))).toBe(97.2);
    // 9725 x 10^-2 F, passed through
    expect(valueOf(decodeTemperature(new Uint8Array([0x01, 0xFD, 0x25, 0x00, 0xFE])))).toBe(97.2);
  });

  it('should round on the stored value rather than its decimal spelling', () => {
    // 3725 x 10^-2 = 37.25 C; 99.05 F is stored slightly below 99.05
    expect(valueOf(decodeTemperature(new Uint8Array([0x00, 0x8D, 0x0E, 0x00, 0xFE])))).toBe(99);
  });

  it('should pass Fahrenheit readings through when flag bit 0 is set', () => {
    // 986 x 10^-1 F
    expect(valueOf(decodeTemperature(new Uint8Array([0x01, 0xDA, 0x03, 0x00, 0xFF])))).toBe(98.6);
  });

  it('should accept the timestamp and type flags', () => {
    expect(valueOf(decodeTemperature(new Uint8Array([0x06, 0x6E, 0x01, 0x00, 0xFF])))).toBe(97.9);
  });

  it('should reject a payload shorter than five bytes', () => {
    expect(errorOf(decodeTemperature(new Uint8Array([0x00, 0x6E, 0x01, 0x00]))).message).toBe(
      'Temperature payload too short: 4 byte(s), need 5 [00 6E 01 00]'
    );
  });

  it('should reject a NaN reading', () => {
    expect(errorOf(decodeTemperature(new Uint8Array([0x00, 0xFF, 0xFF, 0x7F, 0x00]))).message).toBe(
      'FLOAT special value: NaN'
    );
  });

  it('should reject reserved flag bits', () => {
    expect(errorOf(decodeTemperature(new Uint8Array([0x08, 0x6E, 0x01, 0x00, 0xFF]))).message).toBe(
      'Temperature flags 0x08 set reserved bits'
    );
  });
});

describe('roundToTenth', () => {
  it('should send ties to the even neighbour', () => {
    expect(roundToTenth(0.25)).toBe(0.2);
    expect(roundToTenth(0.75)).toBe(0.8);
    expect(roundToTenth(-97.25)).toBe(-97.2);
  });

  it('should round values stored off the halfway point towards where they lie', () => {
    // 0.35 is stored below the half, 0.45 above it
    expect(roundToTenth(0.35)).toBe(0.3);
    expect(roundToTenth(0.45)).toBe(0.5);
  });

  it('should leave whole numbers alone', () => {
    expect(roundToTenth(-22)).toBe(-22);
    expect(roundToTenth(100)).toBe(100);
  });
});

describe('decodeBloodPressure', () => {
  it('should decode systolic and diastolic in mmHg', () => {
    expect(valueOf(decodeBloodPressure(new Uint8Array([0x00, 0x78, 0x00, 0x50, 0x00])))).toEqual({
      systolic: 120,
      diastolic: 80
    });
  });

  it('should convert kPa to whole mmHg when flag bit 0 is set', () => {
    // 16.0 kPa and 10.7 kPa
    expect(valueOf(decodeBloodPressure(new Uint8Array([0x01, 0xA0, 0xF0, 0x6B, 0xF0])))).toEqual({
      systolic: 120,
      diastolic: 80
    });
  });

  it('should truncate fractional mmHg', () => {
    // 1205 x 10^-1 and 805 x 10^-1
    expect(valueOf(decodeBloodPressure(new Uint8Array([0x00, 0xB5, 0xF4, 0x25, 0xF3])))).toEqual({
      systolic: 120,
      diastolic: 80
    });
  });

  it('should reject a short payload', () => {
    expect(errorOf(decodeBloodPressure(new Uint8Array([0x00, 0x78, 0x00]))).message).toBe(
      'Blood pressure payload too short: 3 byte(s), need 5 [00 78 00]'
    );
  });

  it('should reject a NaN diastolic value', () => {
    expect(errorOf(decodeBloodPressure(new Uint8Array([0x00, 0x78, 0x00, 0xFF, 0x07]))).message).toBe(
      'SFLOAT special value: NaN'
    );
  });
});

describe('decodeOxygenSaturation', () => {
  it('should read the percentage from byte 1', () => {
    expect(valueOf(decodeOxygenSaturation(new Uint8Array([0x00, 97])))).toBe(97);
  });

  it('should reject values above 100', () => {
    expect(errorOf(decodeOxygenSaturation(new Uint8Array([0x00, 101]))).message).toBe(
      'Oxygen saturation out of range: 101%'
    );
  });

  it('should reject a one-byte payload', () => {
    expect(errorOf(decodeOxygenSaturation(new Uint8Array([0x00]))).message).toBe(
      'Oxygen saturation payload too short: 1 byte(s), need 2 [00]'
    );
  });
});

describe('decodeBatteryLevel', () => {
  it('should read a single percentage byte', () => {
    expect(valueOf(decodeBatteryLevel(new Uint8Array([85])))).toBe(85);
    expect(valueOf(decodeBatteryLevel(new Uint8Array([0])))).toBe(0);
  });

  it('should reject values above 100', () => {
    expect(errorOf(decodeBatteryLevel(new Uint8Array([0xFF]))).message).toBe('Battery level out of range: 255%');
  });

  it('should reject an empty payload', () => {
    expect(errorOf(decodeBatteryLevel(new Uint8Array([]))).message).toBe(
      'Battery level payload too short: 0 byte(s), need 1 []'
    );
  });
});

describe('VITAL_DECODERS', () => {
  it('should map every service onto the snapshot fields it owns', () => {
    expect(valueOf(VITAL_DECODERS[ServiceKind.HEART_RATE](new Uint8Array([0x00, 60])))).toEqual({ heartRateBpm: 60 });
    expect(valueOf(VITAL_DECODERS[ServiceKind.TEMPERATURE](new Uint8Array([0x00, 0x6E, 0x01, 0x00, 0xFF])))).toEqual({
      temperatureF: 97.9
    });
    expect(valueOf(VITAL_DECODERS[ServiceKind.BLOOD_PRESSURE](new Uint8Array([0x00, 0x78, 0x00, 0x50, 0x00])))).toEqual({
      bloodPressureSystolic: 120,
      bloodPressureDiastolic: 80
    });
    expect(valueOf(VITAL_DECODERS[ServiceKind.OXYGEN_SATURATION](new Uint8Array([0x00, 99])))).toEqual({
      oxygenSaturationPct: 99
    });
    expect(valueOf(VITAL_DECODERS[ServiceKind.BATTERY](new Uint8Array([42])))).toEqual({ batteryPct: 42 });
  });

  it('should return DecodeError instances rather than throwing', () => {
    const result = VITAL_DECODERS[ServiceKind.BATTERY](new Uint8Array([]));
    expect(result.ok).toBe(false);
    expect(errorOf(result)).toBeInstanceOf(DecodeError);
    expect(errorOf(result).code).toBe('DECODE_ERROR');
  });
});
