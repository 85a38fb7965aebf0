export const POINT_KINDS = [
  'analogInput',
  'analogOutput',
  'analogValue',
  'binaryInput',
  'binaryOutput',
  'binaryValue',
  'multistateInput',
  'multistateOutput',
  'multistateValue',
] as const;

export type PointKind = typeof POINT_KINDS[number];

export type PointFamily = 'analog' | 'binary' | 'multistate';

export type PointRole = 'input' | 'output' | 'value';

export interface PointKindTraits {
  family: PointFamily;
  role: PointRole;
  label: string;
  abbreviation: string;
}

export const POINT_KIND_TRAITS: Record<PointKind, PointKindTraits> = {
  analogInput: {
    family: 'analog', role: 'input', label: 'Analog Input', abbreviation: 'AI',
  },
  analogOutput: {
    family: 'analog', role: 'output', label: 'Analog Output', abbreviation: 'AO',
  },
  analogValue: {
    family: 'analog', role: 'value', label: 'Analog Value', abbreviation: 'AV',
  },
  binaryInput: {
    family: 'binary', role: 'input', label: 'Binary Input', abbreviation: 'BI',
  },
  binaryOutput: {
    family: 'binary', role: 'output', label: 'Binary Output', abbreviation: 'BO',
  },
  binaryValue: {
    family: 'binary', role: 'value', label: 'Binary Value', abbreviation: 'BV',
  },
  multistateInput: {
    family: 'multistate', role: 'input', label: 'Multistate Input', abbreviation: 'MI',
  },
  multistateOutput: {
    family: 'multistate', role: 'output', label: 'Multistate Output', abbreviation: 'MO',
  },
  multistateValue: {
    family: 'multistate', role: 'value', label: 'Multistate Value', abbreviation: 'MV',
  },
};

export function isPointKind(value: unknown): value is PointKind {
  return POINT_KINDS.some((entry) => entry === value);
}

export function isCommandableKind(kind: PointKind): boolean {
  return POINT_KIND_TRAITS[kind].role !== 'input';
}

export function pointKey(kind: PointKind, instance: number): string {
  return `${kind}:${instance}`;
}

function normalizeLabel(value: string): string {
  return value.toLowerCase().replace(/[^a-z]/g, '');
}

const KIND_BY_LABEL = new Map<string, PointKind>();
for (const kind of POINT_KINDS) {
  const traits = POINT_KIND_TRAITS[kind];
  KIND_BY_LABEL.set(normalizeLabel(kind), kind);
  KIND_BY_LABEL.set(normalizeLabel(traits.label), kind);
  KIND_BY_LABEL.set(normalizeLabel(traits.abbreviation), kind);
}
// "Multi State Input" and "multi-state-value" normalize to the same key as "multistate...".
KIND_BY_LABEL.set('msi', 'multistateInput');
KIND_BY_LABEL.set('mso', 'multistateOutput');
KIND_BY_LABEL.set('msv', 'multistateValue');

/**
 * Accepts the labels found in point tables: "Analog Input", "Multi State Value",
 * "multistateOutput", "binary_value", "AI", "MSV".
 */
export function parsePointKind(label: string): PointKind | undefined {
  return KIND_BY_LABEL.get(normalizeLabel(label));
}
