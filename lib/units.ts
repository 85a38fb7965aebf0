export const ENGINEERING_UNITS = [
  'degreesCelsius',
  'degreesFahrenheit',
  'percent',
  'percentRelativeHumidity',
  'cubicFeetPerMinute',
  'litersPerSecond',
  'pascals',
  'inchesOfWater',
  'noUnits',
] as const;

export type EngineeringUnit = typeof ENGINEERING_UNITS[number];

export function isEngineeringUnit(value: unknown): value is EngineeringUnit {
  return ENGINEERING_UNITS.some((entry) => entry === value);
}

const UNIT_ALIASES: Record<string, EngineeringUnit> = {
  '°c': 'degreesCelsius',
  degc: 'degreesCelsius',
  c: 'degreesCelsius',
  '°f': 'degreesFahrenheit',
  degf: 'degreesFahrenheit',
  f: 'degreesFahrenheit',
  '%': 'percent',
  '%rh': 'percentRelativeHumidity',
  rh: 'percentRelativeHumidity',
  cfm: 'cubicFeetPerMinute',
  'l/s': 'litersPerSecond',
  lps: 'litersPerSecond',
  pa: 'pascals',
  inwc: 'inchesOfWater',
  'in.w.c.': 'inchesOfWater',
  none: 'noUnits',
  '': 'noUnits',
};

export function parseEngineeringUnit(value: string): EngineeringUnit | undefined {
  const trimmed = value.trim();
  if (isEngineeringUnit(trimmed)) return trimmed;
  return UNIT_ALIASES[trimmed.toLowerCase()];
}

/**
 * Infers units from a point name and its raw present-value text, e.g. "72.9 °F"
 * or "450 CFM". Falls back to noUnits.
 */
export function inferEngineeringUnit(name: string, rawValue: string): EngineeringUnit {
  const lowerName = name.toLowerCase();
  const lowerValue = rawValue.toLowerCase();

  if (lowerName.includes('temp') || /°\s*[cf]\b/.test(lowerValue)) {
    return /°\s*f|\bdegf\b/.test(lowerValue) ? 'degreesFahrenheit' : 'degreesCelsius';
  }
  if (lowerName.includes('humid') || lowerValue.includes('%rh')) return 'percentRelativeHumidity';
  if (lowerValue.includes('cfm') || lowerName.includes('cfm')) return 'cubicFeetPerMinute';
  if (lowerValue.includes('l/s')) return 'litersPerSecond';
  if (lowerName.includes('flow')) return 'cubicFeetPerMinute';
  if (lowerValue.includes('%') || lowerName.includes('percent') || lowerName.includes('speed')) return 'percent';
  if (lowerName.includes('pressure')) return 'pascals';
  return 'noUnits';
}

export function isTemperatureUnit(units: EngineeringUnit | undefined): boolean {
  return units === 'degreesCelsius' || units === 'degreesFahrenheit';
}

export function celsiusToUnit(celsius: number, units: EngineeringUnit | undefined): number {
  return units === 'degreesFahrenheit' ? celsius * 1.8 + 32 : celsius;
}

export function celsiusDeltaToUnit(delta: number, units: EngineeringUnit | undefined): number {
  return units === 'degreesFahrenheit' ? delta * 1.8 : delta;
}
