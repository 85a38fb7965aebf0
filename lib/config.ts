import fs from 'fs';
import path from 'path';
import { parse } from 'ini';

import { clamp } from './numeric';

export interface SimulationSettings {
  /** Seconds of simulated time per tick; also the wall-clock tick period. */
  stepInterval: number;
  aiVariationRange: number;
  aoPriority16Variation: number;
  binaryFlipProbability: number;
  /** Mean seconds between automatic multistate transitions. */
  multistateChangeInterval: number;
  temperatureDriftRate: number;
  flowVariationFactor: number;
  outdoorTempCycleMinutes: number;
  outdoorTempBase: number;
  outdoorTempAmplitude: number;
  humidityBase: number;
  humidityRange: number;
  humidityStep: number;
  priorityAwareSimulation: boolean;
  seed?: number;
}

export interface DeviceSettings {
  port: number;
  deviceId: number;
  deviceName: string;
  deviceDescription: string;
  address?: string;
  vendorName: string;
  vendorId: number;
  modelName: string;
  firmware: string;
}

export interface VirtualDeviceConfig {
  device: DeviceSettings;
  simulation: SimulationSettings;
  pointsFile: string;
}

export interface ConfigLoadResult {
  config: VirtualDeviceConfig;
  warnings: string[];
}

export const DEFAULT_SIMULATION_SETTINGS: SimulationSettings = {
  stepInterval: 0.5,
  aiVariationRange: 0.15,
  aoPriority16Variation: 0.25,
  binaryFlipProbability: 0.01,
  multistateChangeInterval: 20,
  temperatureDriftRate: 0.05,
  flowVariationFactor: 0.1,
  outdoorTempCycleMinutes: 20,
  outdoorTempBase: 21,
  outdoorTempAmplitude: 6,
  humidityBase: 50,
  humidityRange: 25,
  humidityStep: 0.2,
  priorityAwareSimulation: true,
};

export const DEFAULT_DEVICE_SETTINGS: DeviceSettings = {
  port: 47809,
  deviceId: 3001,
  deviceName: 'Virtual VAV Unit',
  deviceDescription: 'Simulated VAV box controller',
  vendorName: 'Virtual Devices',
  vendorId: 999,
  modelName: 'VAV-SIM',
  firmware: '1.0.0',
};

export const DEFAULT_POINTS_FILE = 'points.csv';

type Range = [min: number, max: number];

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(parsed: Section, name: string): Section {
  const value = parsed[name];
  return isSection(value) ? value : {};
}

class SectionReader {
  constructor(
    private readonly section: Section,
    private readonly name: string,
    private readonly warnings: string[],
  ) {}

  number(key: string, fallback: number, [min, max]: Range, integer = false): number {
    const raw = this.section[key];
    if (raw === undefined || raw === '') return fallback;
    const parsed = typeof raw === 'number' ? raw : Number(String(raw).trim());
    if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
      this.warnings.push(`[${this.name}] ${key}: "${String(raw)}" is not a valid number, using ${fallback}`);
      return fallback;
    }
    const bounded = clamp(parsed, min, max);
    if (bounded !== parsed) {
      this.warnings.push(`[${this.name}] ${key}: ${parsed} is outside [${min}, ${max}], using ${bounded}`);
    }
    return bounded;
  }

  optionalNumber(key: string): number | undefined {
    const raw = this.section[key];
    if (raw === undefined || raw === '') return undefined;
    const parsed = Number(String(raw).trim());
    if (!Number.isFinite(parsed)) {
      this.warnings.push(`[${this.name}] ${key}: "${String(raw)}" is not a valid number, ignoring`);
      return undefined;
    }
    return parsed;
  }

  boolean(key: string, fallback: boolean): boolean {
    const raw = this.section[key];
    if (raw === undefined || raw === '') return fallback;
    if (typeof raw === 'boolean') return raw;
    const text = String(raw).trim().toLowerCase();
    if (['true', 'yes', 'on', '1'].includes(text)) return true;
    if (['false', 'no', 'off', '0'].includes(text)) return false;
    this.warnings.push(`[${this.name}] ${key}: "${String(raw)}" is not a boolean, using ${fallback}`);
    return fallback;
  }

  string(key: string, fallback: string): string {
    const raw = this.section[key];
    if (raw === undefined || raw === null) return fallback;
    const text = String(raw).trim();
    return text === '' ? fallback : text;
  }

  optionalString(key: string): string | undefined {
    const raw = this.section[key];
    if (raw === undefined || raw === null) return undefined;
    const text = String(raw).trim();
    return text === '' ? undefined : text;
  }
}

export function defaultConfig(baseDir: string = process.cwd()): VirtualDeviceConfig {
  return {
    device: { ...DEFAULT_DEVICE_SETTINGS },
    simulation: { ...DEFAULT_SIMULATION_SETTINGS },
    pointsFile: path.resolve(baseDir, DEFAULT_POINTS_FILE),
  };
}

/**
 * Parses the INI configuration. Relative `points_file` paths resolve against `baseDir`.
 * Bad values fall back to defaults and are reported as warnings.
 */
export function parseConfig(text: string, baseDir: string): ConfigLoadResult {
  const warnings: string[] = [];
  const parsed: Section = parse(text);

  const device = new SectionReader(sectionOf(parsed, 'device'), 'device', warnings);
  const data = new SectionReader(sectionOf(parsed, 'data'), 'data', warnings);
  const simulation = new SectionReader(sectionOf(parsed, 'simulation'), 'simulation', warnings);
  const environment = new SectionReader(sectionOf(parsed, 'environment'), 'environment', warnings);
  const defaults = DEFAULT_SIMULATION_SETTINGS;

  const config: VirtualDeviceConfig = {
    device: {
      port: device.number('port', DEFAULT_DEVICE_SETTINGS.port, [1, 65535], true),
      deviceId: device.number('device_id', DEFAULT_DEVICE_SETTINGS.deviceId, [0, 4194302], true),
      deviceName: device.string('device_name', DEFAULT_DEVICE_SETTINGS.deviceName),
      deviceDescription: device.string('device_description', DEFAULT_DEVICE_SETTINGS.deviceDescription),
      address: device.optionalString('address'),
      vendorName: device.string('vendor_name', DEFAULT_DEVICE_SETTINGS.vendorName),
      vendorId: device.number('vendor_id', DEFAULT_DEVICE_SETTINGS.vendorId, [0, 65535], true),
      modelName: device.string('model_name', DEFAULT_DEVICE_SETTINGS.modelName),
      firmware: device.string('firmware', DEFAULT_DEVICE_SETTINGS.firmware),
    },
    simulation: {
      stepInterval: simulation.number('step_interval', defaults.stepInterval, [0.05, 60]),
      aiVariationRange: simulation.number('ai_variation_range', defaults.aiVariationRange, [0, 1]),
      aoPriority16Variation: simulation.number('ao_priority16_variation', defaults.aoPriority16Variation, [0, 1]),
      binaryFlipProbability: simulation.number('binary_flip_probability', defaults.binaryFlipProbability, [0, 1]),
      multistateChangeInterval: simulation.number(
        'multistate_change_interval',
        defaults.multistateChangeInterval,
        [0, 86400],
      ),
      temperatureDriftRate: simulation.number('temperature_drift_rate', defaults.temperatureDriftRate, [0, 1]),
      flowVariationFactor: simulation.number('flow_variation_factor', defaults.flowVariationFactor, [0, 1]),
      priorityAwareSimulation: simulation.boolean('priority_aware_simulation', defaults.priorityAwareSimulation),
      seed: simulation.optionalNumber('seed'),
      outdoorTempCycleMinutes: environment.number(
        'outdoor_temp_cycle_minutes',
        defaults.outdoorTempCycleMinutes,
        [0.1, 1440],
      ),
      outdoorTempBase: environment.number('outdoor_temp_base', defaults.outdoorTempBase, [-60, 60]),
      outdoorTempAmplitude: environment.number('outdoor_temp_amplitude', defaults.outdoorTempAmplitude, [0, 40]),
      humidityBase: environment.number('humidity_base', defaults.humidityBase, [0, 100]),
      humidityRange: environment.number('humidity_range', defaults.humidityRange, [0, 50]),
      humidityStep: environment.number('humidity_step', defaults.humidityStep, [0, 10]),
    },
    pointsFile: path.resolve(baseDir, data.string('points_file', DEFAULT_POINTS_FILE)),
  };

  return { config, warnings };
}

export function loadConfigFile(filePath: string): ConfigLoadResult {
  const resolved = path.resolve(filePath);
  const baseDir = path.dirname(resolved);
  if (!fs.existsSync(resolved)) {
    return {
      config: defaultConfig(baseDir),
      warnings: [`Config file ${resolved} not found, using defaults`],
    };
  }
  return parseConfig(fs.readFileSync(resolved, 'utf8'), baseDir);
}
