/**
 * Unit Conversion Service
 *
 * Converts kitchen quantities within a dimension, pivoting through
 * ml (volume), g (weight) and celsius (temperature). Factors come from
 * data/units.json.
 */

import { unitTableSchema } from '../schemas/reference.schema.js';
import type { UnitDimension } from '../shared.js';
import { loadReferenceTable } from './reference-data.js';

const UNIT_TABLE = loadReferenceTable('units.json', unitTableSchema);

/** Pivot unit of each dimension. */
export const STANDARD_UNITS: Readonly<Record<UnitDimension, string>> = Object.freeze({
  volume: 'ml',
  weight: 'g',
  temperature: 'celsius',
});

const LINEAR_FACTORS: ReadonlyMap<string, { dimension: 'volume' | 'weight'; factor: number }> =
  new Map<string, { dimension: 'volume' | 'weight'; factor: number }>([
    ...Object.entries(UNIT_TABLE.volume).map(
      ([unit, factor]) => [unit, { dimension: 'volume' as const, factor }] as const
    ),
    ...Object.entries(UNIT_TABLE.weight).map(
      ([unit, factor]) => [unit, { dimension: 'weight' as const, factor }] as const
    ),
  ]);

const TEMPERATURE_UNITS: ReadonlySet<string> = new Set(UNIT_TABLE.temperature);

export function normalizeUnit(unit: string): string {
  return unit.trim().toLowerCase();
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Classifies a unit spelling. Returns null for anything outside the table
 * (pieces, cloves, pinches, ...).
 */
export function getUnitDimension(unit: string): UnitDimension | null {
  const normalized = normalizeUnit(unit);
  const linear = LINEAR_FACTORS.get(normalized);
  if (linear !== undefined) {
    return linear.dimension;
  }
  return TEMPERATURE_UNITS.has(normalized) ? 'temperature' : null;
}

function convertTemperature(quantity: number, fromUnit: string, toUnit: string): number {
  if (fromUnit === toUnit) {
    return quantity;
  }

  let celsius: number;
  if (fromUnit === 'fahrenheit') {
    celsius = ((quantity - 32) * 5) / 9;
  } else if (fromUnit === 'kelvin') {
    celsius = quantity - 273.15;
  } else {
    celsius = quantity;
  }

  if (toUnit === 'fahrenheit') {
    return (celsius * 9) / 5 + 32;
  }
  if (toUnit === 'kelvin') {
    return celsius + 273.15;
  }
  return celsius;
}

/**
 * Converts a quantity between two units of the same dimension.
 *
 * Identical spellings short-circuit and return the input untouched, even when
 * the unit is unknown. Volume and weight results are rounded to 3 decimals;
 * temperatures are not rounded. Returns null when the units are unknown or
 * belong to different dimensions.
 */
export function convertUnits(quantity: number, fromUnit: string, toUnit: string): number | null {
  const from = normalizeUnit(fromUnit);
  const to = normalizeUnit(toUnit);

  if (from === to) {
    return quantity;
  }

  const dimension = getUnitDimension(from);
  if (dimension === null || dimension !== getUnitDimension(to)) {
    return null;
  }

  if (dimension === 'temperature') {
    return convertTemperature(quantity, from, to);
  }

  const source = LINEAR_FACTORS.get(from);
  const target = LINEAR_FACTORS.get(to);
  if (source === undefined || target === undefined) {
    return null;
  }

  return roundTo((quantity * source.factor) / target.factor, 3);
}

/** Expresses a quantity in its dimension's standard unit; unknown units pass through. */
export function toStandardUnit(quantity: number, unit: string): number {
  const dimension = getUnitDimension(unit);
  if (dimension === null) {
    return quantity;
  }

  if (dimension === 'temperature') {
    return convertTemperature(quantity, normalizeUnit(unit), STANDARD_UNITS.temperature);
  }

  return convertUnits(quantity, unit, STANDARD_UNITS[dimension]) ?? quantity;
}

/** Standard unit for a unit's dimension, or the unit itself when it is unknown. */
export function getStandardUnitFor(unit: string): string {
  const dimension = getUnitDimension(unit);
  return dimension === null ? unit : STANDARD_UNITS[dimension];
}

export function areUnitsCompatible(unitA: string, unitB: string): boolean {
  const dimension = getUnitDimension(unitA);
  return dimension !== null && dimension === getUnitDimension(unitB);
}

/** Every spelling that shares a dimension with `unit`, in table order. */
export function getCompatibleUnits(unit: string): string[] {
  const dimension = getUnitDimension(unit);
  if (dimension === null) {
    return [];
  }
  if (dimension === 'temperature') {
    return [...UNIT_TABLE.temperature];
  }
  return Object.keys(UNIT_TABLE[dimension]);
}

/**
 * Fixed-point text with exact ties rounded to the even digit (2.25 -> "2.2").
 * `toFixed` alone rounds those ties away from zero.
 */
export function toFixedHalfEven(value: number, decimals: number): string {
  const rounded = value.toFixed(decimals);
  const [whole = '', fraction = ''] = Math.abs(value).toFixed(100).split('.');
  if (!/^50*$/.test(fraction.slice(decimals))) {
    return rounded;
  }

  const kept = fraction.slice(0, decimals);
  const lastDigit = Number((kept === '' ? whole : kept).slice(-1));
  if (lastDigit % 2 === 1) {
    return rounded;
  }
  const truncated = kept === '' ? whole : `${whole}.${kept}`;
  return value < 0 ? `-${truncated}` : truncated;
}

export function formatQuantity(quantity: number, unit: string): string {
  if (Number.isInteger(quantity)) {
    return `${quantity} ${unit}`;
  }
  if (quantity < 0.1) {
    return `${toFixedHalfEven(quantity, 3)} ${unit}`;
  }
  if (quantity < 1) {
    return `${toFixedHalfEven(quantity, 2)} ${unit}`;
  }
  return `${toFixedHalfEven(quantity, 1)} ${unit}`;
}
