/**
 * Value coercions
 *
 * Each coercion either yields a column value or a reason the raw value
 * could not be used. None of them throw.
 */

import type { ColumnValue } from '@geosync/core';
import type { FieldCoercion } from '../types/index.js';

export type Coerced = { ok: true; value: ColumnValue } | { ok: false; reason: string };

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function ok(value: ColumnValue): Coerced {
  return { ok: true, value };
}

function fail(reason: string): Coerced {
  return { ok: false, reason };
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (Array.isArray(value)) return 'an array';
  if (value === null) return 'null';
  return typeof value === 'object' ? 'an object' : String(value);
}

/** Parse a finite number from a number or a plain decimal string */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL.test(trimmed)) return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function coerceText(value: unknown): Coerced {
  if (typeof value === 'string') return ok(value);
  if (typeof value === 'number' && Number.isFinite(value)) return ok(String(value));
  return fail(`expected text, got ${describeValue(value)}`);
}

export function coerceNumber(value: unknown): Coerced {
  const n = toFiniteNumber(value);
  return n === null ? fail(`expected a number, got ${describeValue(value)}`) : ok(n);
}

export function coerceInteger(value: unknown): Coerced {
  const n = toFiniteNumber(value);
  return n !== null && Number.isSafeInteger(n)
    ? ok(n)
    : fail(`expected an integer, got ${describeValue(value)}`);
}

function coordinate(lon: unknown, lat: unknown): { lon: number; lat: number } | string {
  const x = toFiniteNumber(lon);
  const y = toFiniteNumber(lat);
  if (x === null) return `longitude ${describeValue(lon)} is not a number`;
  if (y === null) return `latitude ${describeValue(lat)} is not a number`;
  if (x < -180 || x > 180) return `longitude ${x} is outside [-180, 180]`;
  if (y < -90 || y > 90) return `latitude ${y} is outside [-90, 90]`;
  return { lon: x, lat: y };
}

export function coercePointWkt(values: readonly unknown[]): Coerced {
  if (values.length !== 2) {
    return fail(`a point needs [lon, lat] sources, got ${values.length}`);
  }
  const point = coordinate(values[0], values[1]);
  if (typeof point === 'string') return fail(point);
  return ok(`POINT(${point.lon} ${point.lat})`);
}

export function coerceLineStringWkt(value: unknown): Coerced {
  if (!Array.isArray(value)) {
    return fail(`expected an array of {lat, lon} points, got ${describeValue(value)}`);
  }
  const vertices: unknown[] = value;
  if (vertices.length < 2) {
    return fail(`a line needs at least 2 points, got ${vertices.length}`);
  }

  const coords: string[] = [];
  for (const [i, vertex] of vertices.entries()) {
    if (typeof vertex !== 'object' || vertex === null || !('lat' in vertex) || !('lon' in vertex)) {
      return fail(`point ${i} is not a {lat, lon} object`);
    }
    const point = coordinate(vertex.lon, vertex.lat);
    if (typeof point === 'string') return fail(`point ${i}: ${point}`);
    coords.push(`${point.lon} ${point.lat}`);
  }
  return ok(`LINESTRING(${coords.join(', ')})`);
}

/**
 * Apply a coercion to the value(s) read for a mapping
 */
export function applyCoercion(coercion: FieldCoercion, values: readonly unknown[]): Coerced {
  const [first] = values;
  switch (coercion) {
    case 'text':
      return coerceText(first);
    case 'number':
      return coerceNumber(first);
    case 'integer':
      return coerceInteger(first);
    case 'pointWkt':
      return coercePointWkt(values);
    case 'lineStringWkt':
      return coerceLineStringWkt(first);
  }
}
