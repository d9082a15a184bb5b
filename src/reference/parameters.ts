/**
 * Recognized process parameters, in declaration order.
 * Declaration order is significant: it breaks gap-priority ties.
 */

import type {
  NumericParameterSchema,
  ParameterName,
  ParameterSchema,
} from '../types/common.js';

export const PARAMETER_SCHEMAS: readonly ParameterSchema[] = [
  {
    name: 'material',
    kind: 'categorical',
    options: null,
    description: 'Material class of the flow',
  },
  {
    name: 'production_rate',
    kind: 'numeric',
    unit: 't',
    min: 0,
    max: 1e9,
    clampTolerance: 1e-6,
    physical: true,
    description: 'Material throughput (total input mass)',
  },
  {
    name: 'energy_use',
    kind: 'numeric',
    unit: 'kWh',
    min: 0,
    max: 1e13,
    clampTolerance: 1e-6,
    physical: true,
    description: 'Process energy consumption',
  },
  {
    name: 'water_use',
    kind: 'numeric',
    unit: 'L',
    min: 0,
    max: 1e14,
    clampTolerance: 1e-6,
    physical: true,
    description: 'Process water consumption',
  },
  {
    name: 'transport_distance',
    kind: 'numeric',
    unit: 'km',
    min: 0,
    max: 40_000,
    clampTolerance: 1e-6,
    physical: true,
    description: 'Average haul distance of the material',
  },
  {
    name: 'recycling_rate',
    kind: 'numeric',
    unit: 'fraction',
    min: 0,
    max: 1,
    clampTolerance: 0.01,
    physical: false,
    accuracyScale: 1,
    description: 'Share of input mass that is recycled or reused',
  },
  {
    name: 'renewable_energy_percent',
    kind: 'numeric',
    unit: '%',
    min: 0,
    max: 100,
    clampTolerance: 1,
    physical: false,
    accuracyScale: 100,
    description: 'Share of energy from renewable sources',
  },
  {
    name: 'waste_generation',
    kind: 'numeric',
    unit: 't',
    min: 0,
    max: 1e9,
    clampTolerance: 1e-6,
    physical: true,
    description: 'Process waste mass',
  },
  {
    name: 'process_stage',
    kind: 'categorical',
    options: [
      'extraction',
      'primary_production',
      'manufacturing',
      'recycling',
      'end_of_life',
    ],
    description: 'Life-cycle stage the process belongs to',
  },
];

const BY_NAME = new Map<string, ParameterSchema>(
  PARAMETER_SCHEMAS.map((s) => [s.name, s])
);

export function isParameterName(name: string): name is ParameterName {
  return BY_NAME.has(name);
}

export function getParameterSchema(name: ParameterName): ParameterSchema {
  const schema = BY_NAME.get(name);
  if (!schema) throw new Error(`Unknown parameter: ${name}`);
  return schema;
}

export function getNumericSchema(name: ParameterName): NumericParameterSchema | null {
  const schema = getParameterSchema(name);
  return schema.kind === 'numeric' ? schema : null;
}

export function declarationIndex(name: ParameterName): number {
  return PARAMETER_SCHEMAS.findIndex((s) => s.name === name);
}
