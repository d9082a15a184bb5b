/**
 * Parameter values share one text column; the kind column says how to read it.
 */

import { getParameterSchema } from '../reference/parameters.js';
import type { ParameterName, ParameterValue } from '../types/common.js';
import type { ValueKind } from '../types/database.js';

export function valueKindOf(parameter: ParameterName): ValueKind {
  return getParameterSchema(parameter).kind;
}

export function encodeValue(value: ParameterValue): string;
export function encodeValue(value: ParameterValue | null): string | null;
export function encodeValue(value: ParameterValue | null): string | null {
  return value === null ? null : String(value);
}

export function decodeValue(text: string, kind: ValueKind): ParameterValue;
export function decodeValue(text: string | null, kind: ValueKind): ParameterValue | null;
export function decodeValue(text: string | null, kind: ValueKind): ParameterValue | null {
  if (text === null) return null;
  if (kind === 'categorical') return text;
  const n = Number(text);
  return Number.isFinite(n) ? n : text;
}
