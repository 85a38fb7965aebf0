import { DEFAULT_DEVICE_SETTINGS, DeviceSettings, SimulationSettings } from './config';
import { EnvironmentSnapshot } from './environment';
import { Logger, silentLogger } from './logger';
import { roundTo } from './numeric';
import { Point, PointDefinition, PointValue } from './point';
import { PointKind } from './pointKinds';
import { PointRegistry } from './pointRegistry';
import { RandomSource } from './random';
import {
  PointResult, success,
} from './results';
import { SimulationEngine, TickReport } from './simulationEngine';
import { EngineeringUnit } from './units';

export interface DeviceIdentity {
  deviceId: number;
  deviceName: string;
  description: string;
  vendorName: string;
  vendorId: number;
  modelName: string;
  firmware: string;
}

export interface PointSummary {
  kind: PointKind;
  instance: number;
  name: string;
  description: string;
  units?: EngineeringUnit;
  value: PointValue;
  /** State name for multistate points. */
  stateName?: string;
  commandable: boolean;
  activePriority: number | null;
  lastUpdateMs: number | null;
}

export interface PointDetail extends PointSummary {
  relinquishDefault: PointValue | null;
  priorityArray: Array<PointValue | null> | null;
  stateText?: readonly string[];
}

export interface DeviceSummary {
  identity: DeviceIdentity;
  tick: number;
  elapsedSeconds: number;
  running: boolean;
  priorityAwareSimulation: boolean;
  environment: EnvironmentSnapshot;
  pointCounts: Record<PointKind, number>;
}

export interface DeviceSnapshot extends DeviceSummary {
  points: PointSummary[];
}

export interface VirtualDeviceOptions {
  identity?: Partial<DeviceIdentity>;
  settings: SimulationSettings;
  random?: RandomSource;
  logger?: Logger;
  now?: () => number;
}

export function identityFromSettings(device: DeviceSettings): DeviceIdentity {
  return {
    deviceId: device.deviceId,
    deviceName: device.deviceName,
    description: device.deviceDescription,
    vendorName: device.vendorName,
    vendorId: device.vendorId,
    modelName: device.modelName,
    firmware: device.firmware,
  };
}

function displayValue(value: PointValue): PointValue {
  return typeof value === 'number' ? roundTo(value, 3) : value;
}

function summarize(point: Point): PointSummary {
  const resolved = point.resolve();
  const summary: PointSummary = {
    kind: point.kind,
    instance: point.instance,
    name: point.name,
    description: point.description,
    value: displayValue(resolved.value),
    commandable: point.commandable,
    activePriority: resolved.priority,
    lastUpdateMs: point.lastUpdateMs,
  };
  if (point.units) summary.units = point.units;
  if (point.family === 'multistate' && typeof resolved.value === 'number') {
    summary.stateName = point.stateText[resolved.value - 1];
  }
  return summary;
}

/**
 * One emulated controller: identity, point registry and simulation engine, with
 * the read/write operations protocol adapters call into.
 */
export class VirtualDevice {
  readonly identity: DeviceIdentity;

  readonly registry = new PointRegistry();

  readonly engine: SimulationEngine;

  constructor(options: VirtualDeviceOptions) {
    const defaults = identityFromSettings(DEFAULT_DEVICE_SETTINGS);
    this.identity = { ...defaults, ...options.identity };
    this.engine = new SimulationEngine(this.registry, {
      settings: options.settings,
      random: options.random,
      logger: options.logger ?? silentLogger,
      now: options.now,
    });
  }

  definePoint(definition: PointDefinition): PointResult<Point> {
    return this.registry.define(definition);
  }

  getPoint(kind: PointKind, instance: number): PointResult<Point> {
    return this.registry.find(kind, instance);
  }

  getEffectiveValue(kind: PointKind, instance: number): PointResult<PointValue> {
    const found = this.registry.find(kind, instance);
    if (!found.ok) return found;
    return success(found.value.effectiveValue);
  }

  /** Sets (value) or clears (null) one priority slot of a commandable point. */
  writePriority(kind: PointKind, instance: number, priority: number, value: PointValue | null): PointResult<null> {
    const found = this.registry.find(kind, instance);
    if (!found.ok) return found;
    return found.value.writePriority(priority, value);
  }

  relinquish(kind: PointKind, instance: number, priority: number): PointResult<null> {
    return this.writePriority(kind, instance, priority, null);
  }

  listPoints(kind?: PointKind): PointSummary[] {
    const points = kind ? this.registry.allOf(kind) : this.registry.all();
    return Array.from(points, summarize);
  }

  describePoint(kind: PointKind, instance: number): PointResult<PointDetail> {
    const found = this.registry.find(kind, instance);
    if (!found.ok) return found;
    const point = found.value;
    const slots = point.priorityArray();
    const detail: PointDetail = {
      ...summarize(point),
      relinquishDefault: point.commandable ? point.relinquishDefault : null,
      priorityArray: slots,
    };
    if (point.family === 'multistate') detail.stateText = point.stateText;
    return success(detail);
  }

  tick(): TickReport {
    return this.engine.tick();
  }

  advance(ticks: number): TickReport | null {
    return this.engine.advance(ticks);
  }

  summary(): DeviceSummary {
    return {
      identity: { ...this.identity },
      tick: this.engine.tickCount,
      elapsedSeconds: roundTo(this.engine.elapsedSeconds, 3),
      running: this.engine.running,
      priorityAwareSimulation: this.engine.priorityAware,
      environment: this.engine.environment.snapshot(),
      pointCounts: this.registry.countByKind(),
    };
  }

  snapshot(): DeviceSnapshot {
    return {
      ...this.summary(),
      points: this.listPoints(),
    };
  }
}
