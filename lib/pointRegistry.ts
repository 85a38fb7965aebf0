import { Point, PointDefinition } from './point';
import { POINT_KINDS, PointKind, pointKey } from './pointKinds';
import {
  PointResult, failure, success,
} from './results';

/**
 * Owns every point of a device, keyed by (kind, instance). Points are added once
 * at startup and never removed.
 */
export class PointRegistry {
  private readonly byKey = new Map<string, Point>();

  private readonly byKind = new Map<PointKind, Point[]>(POINT_KINDS.map((kind) => [kind, []]));

  private readonly ordered: Point[] = [];

  get size(): number {
    return this.ordered.length;
  }

  register(point: Point): PointResult<Point> {
    const key = pointKey(point.kind, point.instance);
    if (this.byKey.has(key)) {
      return failure('DuplicateInstance', `${key} is already registered`);
    }
    this.byKey.set(key, point);
    this.byKind.get(point.kind)?.push(point);
    this.ordered.push(point);
    return success(point);
  }

  /** Validates and registers in one step; the registry is unchanged on failure. */
  define(definition: PointDefinition): PointResult<Point> {
    if (this.byKey.has(pointKey(definition.kind, definition.instance))) {
      return failure('DuplicateInstance', `${pointKey(definition.kind, definition.instance)} is already registered`);
    }
    const created = Point.create(definition);
    if (!created.ok) return created;
    return this.register(created.value);
  }

  find(kind: PointKind, instance: number): PointResult<Point> {
    const point = this.byKey.get(pointKey(kind, instance));
    if (!point) return failure('NotFound', `${pointKey(kind, instance)} does not exist`);
    return success(point);
  }

  has(kind: PointKind, instance: number): boolean {
    return this.byKey.has(pointKey(kind, instance));
  }

  /** Points of one kind in registration order. Each iteration starts over. */
  allOf(kind: PointKind): Iterable<Point> {
    const points = this.byKind.get(kind) ?? [];
    return {
      [Symbol.iterator]: () => points.values(),
    };
  }

  all(): Iterable<Point> {
    const points = this.ordered;
    return {
      [Symbol.iterator]: () => points.values(),
    };
  }

  countByKind(): Record<PointKind, number> {
    const out: Record<PointKind, number> = {
      analogInput: 0,
      analogOutput: 0,
      analogValue: 0,
      binaryInput: 0,
      binaryOutput: 0,
      binaryValue: 0,
      multistateInput: 0,
      multistateOutput: 0,
      multistateValue: 0,
    };
    for (const kind of POINT_KINDS) out[kind] = this.byKind.get(kind)?.length ?? 0;
    return out;
  }
}
