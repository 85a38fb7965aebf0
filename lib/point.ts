import {
  POINT_KIND_TRAITS, PointFamily, PointKind, PointRole, isCommandableKind,
} from './pointKinds';
import {
  PrioritySlots,
  ResolvedValue,
  SIMULATION_PRIORITY,
  createPriorityArray,
  isValidPriority,
  resolvePriorityArray,
} from './priorityResolver';
import {
  PointResult, failure, success,
} from './results';
import { EngineeringUnit } from './units';

export type PointValue = number | boolean;

export interface PointDefinition {
  kind: PointKind;
  instance: number;
  name: string;
  initialValue: PointValue;
  description?: string;
  units?: EngineeringUnit;
  stateText?: readonly string[];
  /** Defaults to `initialValue`. Ignored for inputs. */
  relinquishDefault?: PointValue;
  /** Seeds this priority slot with `initialValue` so the point starts out commanded. */
  overridePriority?: number;
}

export const DEFAULT_STATE_TEXT: readonly string[] = ['State1', 'State2', 'State3', 'State4'];

function describeValue(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

/**
 * Validates a value against a point family. Binary points take booleans or 0/1,
 * multistate points integers within [1, stateCount].
 */
export function coercePointValue(
  family: PointFamily,
  value: unknown,
  stateCount: number,
): PointResult<PointValue> {
  switch (family) {
    case 'analog':
      if (typeof value === 'number' && Number.isFinite(value)) return success(value);
      return failure('TypeMismatch', `Analog value must be a finite number, got ${describeValue(value)}`);
    case 'binary':
      if (typeof value === 'boolean') return success(value);
      if (value === 0 || value === 1) return success(value === 1);
      return failure('TypeMismatch', `Binary value must be true/false or 0/1, got ${describeValue(value)}`);
    case 'multistate':
      if (typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= stateCount) {
        return success(value);
      }
      return failure('TypeMismatch', `Multistate value must be an integer in [1, ${stateCount}], got ${describeValue(value)}`);
    default: {
      const exhaustive: never = family;
      return failure('TypeMismatch', `Unknown point family ${String(exhaustive)}`);
    }
  }
}

interface PointFields {
  kind: PointKind;
  instance: number;
  name: string;
  description: string;
  units: EngineeringUnit | undefined;
  stateText: readonly string[];
  initialValue: PointValue;
  relinquishDefault: PointValue;
}

export class Point {
  readonly kind: PointKind;

  readonly family: PointFamily;

  readonly role: PointRole;

  readonly instance: number;

  readonly name: string;

  readonly description: string;

  readonly units: EngineeringUnit | undefined;

  readonly stateText: readonly string[];

  readonly initialValue: PointValue;

  readonly relinquishDefault: PointValue;

  private readonly slots: Array<PointValue | null> | null;

  private inputValue: PointValue;

  private lastUpdate: number | null = null;

  private constructor(fields: PointFields) {
    this.kind = fields.kind;
    this.family = POINT_KIND_TRAITS[fields.kind].family;
    this.role = POINT_KIND_TRAITS[fields.kind].role;
    this.instance = fields.instance;
    this.name = fields.name;
    this.description = fields.description;
    this.units = fields.units;
    this.stateText = fields.stateText;
    this.initialValue = fields.initialValue;
    this.relinquishDefault = fields.relinquishDefault;
    this.slots = isCommandableKind(fields.kind) ? createPriorityArray<PointValue>() : null;
    this.inputValue = fields.initialValue;
  }

  static create(definition: PointDefinition): PointResult<Point> {
    const { kind, instance } = definition;
    const label = `${kind}:${instance}`;
    const family = POINT_KIND_TRAITS[kind].family;

    if (!Number.isInteger(instance) || instance < 0) {
      return failure('InvalidDefinition', `${label}: instance must be a non-negative integer`);
    }

    let stateText: readonly string[] = [];
    if (family === 'multistate') {
      stateText = definition.stateText ?? DEFAULT_STATE_TEXT;
      if (stateText.length === 0) {
        return failure('InvalidDefinition', `${label}: multistate point needs at least one state`);
      }
    }

    const initial = coercePointValue(family, definition.initialValue, stateText.length);
    if (!initial.ok) return failure('InvalidDefinition', `${label}: initial value rejected: ${initial.message}`);

    let relinquishDefault = initial.value;
    if (definition.relinquishDefault !== undefined) {
      const resolved = coercePointValue(family, definition.relinquishDefault, stateText.length);
      if (!resolved.ok) return failure('InvalidDefinition', `${label}: relinquish default rejected: ${resolved.message}`);
      relinquishDefault = resolved.value;
    }

    const point = new Point({
      kind,
      instance,
      name: definition.name,
      description: definition.description ?? '',
      units: family === 'analog' ? definition.units : undefined,
      stateText,
      initialValue: initial.value,
      relinquishDefault,
    });

    if (definition.overridePriority !== undefined) {
      if (!point.commandable) {
        return failure('InvalidDefinition', `${label}: inputs cannot start with a priority override`);
      }
      const seeded = point.writePriority(definition.overridePriority, initial.value);
      if (!seeded.ok) return failure('InvalidDefinition', `${label}: ${seeded.message}`);
    }

    return success(point);
  }

  get commandable(): boolean {
    return this.slots !== null;
  }

  get stateCount(): number {
    return this.stateText.length;
  }

  get lastUpdateMs(): number | null {
    return this.lastUpdate;
  }

  /** Effective value and the slot it came from. Recomputed on every call. */
  resolve(): ResolvedValue<PointValue> {
    if (!this.slots) return { value: this.inputValue, priority: null };
    return resolvePriorityArray(this.slots, this.relinquishDefault);
  }

  get effectiveValue(): PointValue {
    return this.resolve().value;
  }

  /** Live view of the priority array, or null for inputs. */
  get priorities(): PrioritySlots<PointValue> | null {
    return this.slots;
  }

  priorityArray(): Array<PointValue | null> | null {
    return this.slots ? [...this.slots] : null;
  }

  coerce(value: unknown): PointResult<PointValue> {
    return coercePointValue(this.family, value, this.stateCount);
  }

  writePriority(priority: number, value: PointValue | null): PointResult<null> {
    if (!this.slots) {
      return failure('ReadOnly', `${this.kind}:${this.instance} is an input and cannot be commanded`);
    }
    if (!isValidPriority(priority)) {
      return failure('InvalidPriority', `Priority must be an integer in [1, 16], got ${priority}`);
    }
    if (value === null) {
      this.slots[priority - 1] = null;
      return success(null);
    }
    const coerced = this.coerce(value);
    if (!coerced.ok) return coerced;
    this.slots[priority - 1] = coerced.value;
    return success(null);
  }

  /** Simulator mutation: the input value, or slot 16 of a commandable point. */
  applySimulatedValue(value: PointValue, nowMs: number): PointResult<null> {
    const coerced = this.coerce(value);
    if (!coerced.ok) return coerced;
    if (this.slots) {
      this.slots[SIMULATION_PRIORITY - 1] = coerced.value;
    } else {
      this.inputValue = coerced.value;
    }
    this.lastUpdate = nowMs;
    return success(null);
  }
}
