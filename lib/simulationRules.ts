import { EnvironmentSnapshot } from './environment';
import { clamp } from './numeric';
import { Point, PointValue } from './point';
import { PointKind } from './pointKinds';
import {
  RandomSource, bernoulli, pickOtherState, symmetric, uniform,
} from './random';
import { SimulationSettings } from './config';
import { celsiusDeltaToUnit, celsiusToUnit, isTemperatureUnit } from './units';

/** Share of the outdoor deviation that reaches indoor temperature and humidity targets. */
const OUTDOOR_COUPLING = 0.25;

/** Per-tick pull back toward the seed value for walks without a physical target. */
const MEAN_REVERSION = 0.1;

/** Airflow swing used when the point table seeds a flow point at zero. */
const IDLE_FLOW_BASE = 100;
const IDLE_FLOW_SWING = 50;

export type SimulationProfile =
  | 'outdoorTemperature'
  | 'temperature'
  | 'humidity'
  | 'flow'
  | 'pressure'
  | 'percent'
  | 'generic';

const PROFILE_LIMITS: Record<SimulationProfile, { min?: number; max?: number }> = {
  outdoorTemperature: {},
  temperature: {},
  humidity: { min: 0, max: 100 },
  flow: { min: 0 },
  pressure: {},
  percent: { min: 0, max: 100 },
  generic: {},
};

export interface PointSimulationState {
  profile: SimulationProfile;
  /** Commanded value last seen while slots 1-15 blocked the simulator. */
  heldCommand: PointValue | null;
  secondsSinceChange: number;
  nextChangeAfter: number;
}

export interface RuleContext {
  settings: SimulationSettings;
  environment: EnvironmentSnapshot;
  random: RandomSource;
  stepSeconds: number;
}

export type UpdateRule = (
  point: Point,
  previous: PointValue,
  state: PointSimulationState,
  context: RuleContext,
) => PointValue;

export function simulationProfile(point: Point): SimulationProfile {
  const name = point.name.toLowerCase();
  if (isTemperatureUnit(point.units) || name.includes('temp')) {
    return /outdoor|outside|\boat\b/.test(name) ? 'outdoorTemperature' : 'temperature';
  }
  if (point.units === 'percentRelativeHumidity' || name.includes('humid')) return 'humidity';
  if (point.units === 'cubicFeetPerMinute' || point.units === 'litersPerSecond' || name.includes('flow')) {
    return 'flow';
  }
  if (point.units === 'pascals' || point.units === 'inchesOfWater' || name.includes('pressure')) return 'pressure';
  if (point.units === 'percent') return 'percent';
  return 'generic';
}

export function drawChangeInterval(random: RandomSource, meanSeconds: number): number {
  return uniform(random, 0.5 * meanSeconds, 1.5 * meanSeconds);
}

export function createSimulationState(
  point: Point,
  settings: SimulationSettings,
  random: RandomSource,
): PointSimulationState {
  return {
    profile: simulationProfile(point),
    heldCommand: null,
    secondsSinceChange: 0,
    nextChangeAfter: drawChangeInterval(random, settings.multistateChangeInterval),
  };
}

function asNumber(value: PointValue): number {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function asBoolean(value: PointValue): boolean {
  return typeof value === 'boolean' ? value : value !== 0;
}

function limitForProfile(profile: SimulationProfile, value: number): number {
  const limits = PROFILE_LIMITS[profile];
  return clamp(value, limits.min, limits.max);
}

function nominalScale(profile: SimulationProfile, seed: number): number {
  switch (profile) {
    case 'temperature':
    case 'outdoorTemperature':
      return 1;
    case 'humidity':
      return 2;
    case 'percent':
      return 5;
    default:
      return Math.max(Math.abs(seed) * 0.05, 0.1);
  }
}

/** Flow target: the seed, or a slow sine at half the outdoor cycle rate when seeded at zero. */
export function flowTarget(seed: number, elapsedSeconds: number, settings: SimulationSettings): number {
  if (seed > 0) return seed;
  const period = settings.outdoorTempCycleMinutes * 60 * 2;
  const swing = period > 0 ? Math.sin((2 * Math.PI * elapsedSeconds) / period) : 0;
  return IDLE_FLOW_BASE + IDLE_FLOW_SWING * swing;
}

function simulateAnalogInput(
  point: Point,
  previous: PointValue,
  state: PointSimulationState,
  context: RuleContext,
): PointValue {
  const { settings, environment, random } = context;
  const prev = asNumber(previous);
  const seed = state.profile === 'flow'
    ? flowTarget(asNumber(point.initialValue), environment.elapsedSeconds, settings)
    : asNumber(point.initialValue);
  const noise = symmetric(random, settings.aiVariationRange * nominalScale(state.profile, seed));

  let next: number;
  switch (state.profile) {
    case 'outdoorTemperature':
      next = celsiusToUnit(environment.outdoorTemperature, point.units) + noise;
      break;
    case 'temperature': {
      const outdoorDeviation = environment.outdoorTemperature - settings.outdoorTempBase;
      const target = seed + celsiusDeltaToUnit(outdoorDeviation * OUTDOOR_COUPLING, point.units);
      next = prev + (target - prev) * settings.temperatureDriftRate + noise;
      break;
    }
    case 'humidity': {
      const target = seed + (environment.outdoorHumidity - settings.humidityBase) * OUTDOOR_COUPLING;
      next = prev + (target - prev) * settings.temperatureDriftRate + noise;
      break;
    }
    case 'flow': {
      const reverted = prev + (seed - prev) * MEAN_REVERSION;
      next = reverted * (1 + symmetric(random, settings.flowVariationFactor)) + noise;
      break;
    }
    default:
      next = prev + (seed - prev) * MEAN_REVERSION + noise;
      break;
  }
  return limitForProfile(state.profile, next);
}

function simulateCommandedAnalog(
  _point: Point,
  previous: PointValue,
  state: PointSimulationState,
  context: RuleContext,
): PointValue {
  const basis = asNumber(previous);
  const spread = context.settings.aoPriority16Variation * Math.max(Math.abs(basis), 1);
  const step = symmetric(context.random, spread);
  const next = limitForProfile(state.profile, basis + step);
  // At a limit the step would clamp back onto the basis; step inward instead.
  if (next !== basis || step === 0) return next;
  return limitForProfile(state.profile, basis - step);
}

function flipBinary(
  _point: Point,
  previous: PointValue,
  _state: PointSimulationState,
  context: RuleContext,
): PointValue {
  const current = asBoolean(previous);
  return bernoulli(context.random, context.settings.binaryFlipProbability) ? !current : current;
}

function advanceMultistate(
  point: Point,
  previous: PointValue,
  state: PointSimulationState,
  context: RuleContext,
): PointValue {
  const current = Math.round(clamp(asNumber(previous), 1, point.stateCount));
  state.secondsSinceChange += context.stepSeconds;
  if (state.secondsSinceChange < state.nextChangeAfter) return current;

  state.secondsSinceChange = 0;
  state.nextChangeAfter = drawChangeInterval(context.random, context.settings.multistateChangeInterval);
  return pickOtherState(context.random, point.stateCount, current);
}

export const UPDATE_RULES: Record<PointKind, UpdateRule> = {
  analogInput: simulateAnalogInput,
  analogOutput: simulateCommandedAnalog,
  analogValue: simulateCommandedAnalog,
  binaryInput: flipBinary,
  binaryOutput: flipBinary,
  binaryValue: flipBinary,
  multistateInput: advanceMultistate,
  multistateOutput: advanceMultistate,
  multistateValue: advanceMultistate,
};
