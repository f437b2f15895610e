import { DecodeError } from './errors.js';
import { ServiceKind, type VitalsSnapshot } from './types.js';
import { formatHex } from './utils.js';

/**
 * Characteristic payload decoders.
 *
 * Every decoder is pure and total: malformed input comes back as
 * `{ ok: false, error }` instead of an exception, so one bad notification
 * cannot unwind the dispatcher.
 */

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

export interface Ieee11073Parts {
  mantissa: number;
  exponent: number;
}

export interface BloodPressureReading {
  systolic: number;
  diastolic: number;
}

const KPA_TO_MMHG = 7.50062;

// Special values only exist with a zero exponent; raw (unsigned) mantissas
const FLOAT_SPECIALS: Record<number, string> = {
  0x7FFFFF: 'NaN',
  0x800000: 'NRes',
  0x7FFFFE: '+INFINITY',
  0x800002: '-INFINITY',
  0x800001: 'reserved value'
};

const SFLOAT_SPECIALS: Record<number, string> = {
  0x07FF: 'NaN',
  0x0800: 'NRes',
  0x07FE: '+INFINITY',
  0x0802: '-INFINITY',
  0x0801: 'reserved value'
};

// Bits marked "reserved for future use" in each measurement's flags field
const RESERVED_FLAGS = {
  heartRate: 0xE0,
  temperature: 0xF8,
  bloodPressure: 0xE0,
  oxygen: 0xE0
} as const;

function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

function fail(message: string): { ok: false; error: DecodeError } {
  return { ok: false, error: new DecodeError(message) };
}

function checkLength(name: string, payload: Uint8Array, required: number): DecodeError | null {
  if (payload.length < required) {
    return new DecodeError(
      `${name} payload too short: ${payload.length} byte(s), need ${required} [${formatHex(payload)}]`
    );
  }
  return null;
}

function checkReservedFlags(name: string, flags: number, mask: number): DecodeError | null {
  if (flags & mask) {
    return new DecodeError(`${name} flags 0x${flags.toString(16).padStart(2, '0')} set reserved bits`);
  }
  return null;
}

/**
 * Split a 32-bit IEEE-11073 FLOAT: low 24 bits two's-complement mantissa,
 * high 8 bits two's-complement exponent. Both widths are corrected by hand.
 */
export function unpackFloat(raw: number): DecodeResult<Ieee11073Parts> {
  const rawMantissa = raw & 0x00FFFFFF;
  let exponent = (raw >>> 24) & 0xFF;
  if (exponent & 0x80) {
    exponent -= 0x100;
  }
  if (exponent === 0 && FLOAT_SPECIALS[rawMantissa]) {
    return fail(`FLOAT special value: ${FLOAT_SPECIALS[rawMantissa]}`);
  }
  const mantissa = rawMantissa & 0x00800000 ? rawMantissa - 0x01000000 : rawMantissa;
  return ok({ mantissa, exponent });
}

/**
 * Split a 16-bit IEEE-11073 SFLOAT: low 12 bits mantissa (sign bit 11),
 * high 4 bits exponent (sign bit 3).
 */
export function unpackSfloat(raw: number): DecodeResult<Ieee11073Parts> {
  const rawMantissa = raw & 0x0FFF;
  let exponent = (raw >> 12) & 0x0F;
  if (exponent & 0x08) {
    exponent -= 0x10;
  }
  if (exponent === 0 && SFLOAT_SPECIALS[rawMantissa]) {
    return fail(`SFLOAT special value: ${SFLOAT_SPECIALS[rawMantissa]}`);
  }
  const mantissa = rawMantissa & 0x0800 ? rawMantissa - 0x1000 : rawMantissa;
  return ok({ mantissa, exponent });
}

export function ieee11073ToNumber({ mantissa, exponent }: Ieee11073Parts): number {
  // Dividing for negative exponents keeps -300e-1 at exactly -30
  return exponent >= 0 ? mantissa * 10 ** exponent : mantissa / 10 ** -exponent;
}

export function readFloat(payload: Uint8Array, offset: number): DecodeResult<number> {
  const lengthError = checkLength('FLOAT', payload, offset + 4);
  if (lengthError) return { ok: false, error: lengthError };

  const raw = new DataView(payload.buffer, payload.byteOffset, payload.byteLength).getUint32(offset, true);
  const parts = unpackFloat(raw);
  return parts.ok ? ok(ieee11073ToNumber(parts.value)) : parts;
}

export function readSfloat(payload: Uint8Array, offset: number): DecodeResult<number> {
  const lengthError = checkLength('SFLOAT', payload, offset + 2);
  if (lengthError) return { ok: false, error: lengthError };

  const raw = new DataView(payload.buffer, payload.byteOffset, payload.byteLength).getUint16(offset, true);
  const parts = unpackSfloat(raw);
  return parts.ok ? ok(ieee11073ToNumber(parts.value)) : parts;
}

/**
 * One decimal, ties to even, judged on the exact binary value: 97.25 is a
 * true tie and gives 97.2, while 99.05 is stored just below and gives 99.0.
 */
export function roundToTenth(value: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e15) {
    return value;
  }

  const [whole, fraction = ''] = Math.abs(value).toFixed(100).split('.');
  let tenths = Number(whole + fraction.slice(0, 1));
  const rest = fraction.slice(1);
  const half = '5'.padEnd(rest.length, '0');
  if (rest > half || (rest === half && tenths % 2 === 1)) {
    tenths += 1;
  }

  const rounded = tenths / 10;
  return value < 0 ? -rounded : rounded;
}

export function celsiusToFahrenheit(celsius: number): number {
  return celsius * 9 / 5 + 32;
}

/** Heart Rate Measurement (0x2A37): flags bit 0 picks uint8 or uint16 LE bpm. */
export function decodeHeartRate(payload: Uint8Array): DecodeResult<number> {
  const shortError = checkLength('Heart rate', payload, 2);
  if (shortError) return { ok: false, error: shortError };

  const flags = payload[0];
  const flagError = checkReservedFlags('Heart rate', flags, RESERVED_FLAGS.heartRate);
  if (flagError) return { ok: false, error: flagError };

  if (flags & 0x01) {
    const wideError = checkLength('Heart rate (16-bit)', payload, 3);
    if (wideError) return { ok: false, error: wideError };
    return ok(payload[1] | (payload[2] << 8));
  }
  return ok(payload[1]);
}

/**
 * Temperature Measurement (0x2A1C): FLOAT at bytes 1-4. Flags bit 0 set
 * means the device already reports Fahrenheit. Result is always °F, one decimal.
 */
export function decodeTemperature(payload: Uint8Array): DecodeResult<number> {
  const shortError = checkLength('Temperature', payload, 5);
  if (shortError) return { ok: false, error: shortError };

  const flags = payload[0];
  const flagError = checkReservedFlags('Temperature', flags, RESERVED_FLAGS.temperature);
  if (flagError) return { ok: false, error: flagError };

  const reading = readFloat(payload, 1);
  if (!reading.ok) return reading;

  const fahrenheit = flags & 0x01 ? reading.value : celsiusToFahrenheit(reading.value);
  return ok(roundToTenth(fahrenheit));
}

/**
 * Blood Pressure Measurement (0x2A35): systolic and diastolic SFLOATs at
 * bytes 1-2 and 3-4, truncated to whole mmHg. Flags bit 0 marks kPa.
 */
export function decodeBloodPressure(payload: Uint8Array): DecodeResult<BloodPressureReading> {
  const shortError = checkLength('Blood pressure', payload, 5);
  if (shortError) return { ok: false, error: shortError };

  const flags = payload[0];
  const flagError = checkReservedFlags('Blood pressure', flags, RESERVED_FLAGS.bloodPressure);
  if (flagError) return { ok: false, error: flagError };

  const systolic = readSfloat(payload, 1);
  if (!systolic.ok) return systolic;
  const diastolic = readSfloat(payload, 3);
  if (!diastolic.ok) return diastolic;

  const scale = flags & 0x01 ? KPA_TO_MMHG : 1;
  return ok({
    systolic: Math.trunc(systolic.value * scale),
    diastolic: Math.trunc(diastolic.value * scale)
  });
}

/** PLX Continuous Measurement (0x2A5F): byte 1 holds SpO2 percent. */
export function decodeOxygenSaturation(payload: Uint8Array): DecodeResult<number> {
  const shortError = checkLength('Oxygen saturation', payload, 2);
  if (shortError) return { ok: false, error: shortError };

  const flagError = checkReservedFlags('Oxygen saturation', payload[0], RESERVED_FLAGS.oxygen);
  if (flagError) return { ok: false, error: flagError };

  const percent = payload[1];
  if (percent > 100) {
    return fail(`Oxygen saturation out of range: ${percent}%`);
  }
  return ok(percent);
}

/** Battery Level (0x2A19): one byte, 0-100 percent. */
export function decodeBatteryLevel(payload: Uint8Array): DecodeResult<number> {
  const shortError = checkLength('Battery level', payload, 1);
  if (shortError) return { ok: false, error: shortError };

  const percent = payload[0];
  if (percent > 100) {
    return fail(`Battery level out of range: ${percent}%`);
  }
  return ok(percent);
}

export type VitalsDecoder = (payload: Uint8Array) => DecodeResult<Partial<VitalsSnapshot>>;

function into<T>(
  decode: (payload: Uint8Array) => DecodeResult<T>,
  toPatch: (value: T) => Partial<VitalsSnapshot>
): VitalsDecoder {
  return payload => {
    const result = decode(payload);
    return result.ok ? ok(toPatch(result.value)) : result;
  };
}

/** Decoder per service, producing the snapshot fields that service owns. */
export const VITAL_DECODERS: Readonly<Record<ServiceKind, VitalsDecoder>> = {
  [ServiceKind.HEART_RATE]: into(decodeHeartRate, heartRateBpm => ({ heartRateBpm })),
  [ServiceKind.TEMPERATURE]: into(decodeTemperature, temperatureF => ({ temperatureF })),
  [ServiceKind.BLOOD_PRESSURE]: into(decodeBloodPressure, ({ systolic, diastolic }) => ({
    bloodPressureSystolic: systolic,
    bloodPressureDiastolic: diastolic
  })),
  [ServiceKind.OXYGEN_SATURATION]: into(decodeOxygenSaturation, oxygenSaturationPct => ({ oxygenSaturationPct })),
  [ServiceKind.BATTERY]: into(decodeBatteryLevel, batteryPct => ({ batteryPct }))
};
