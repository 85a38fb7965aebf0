import { performance } from 'perf_hooks';

import { SimulationSettings } from './config';
import { EnvironmentModel, EnvironmentSnapshot } from './environment';
import {
  Logger, logError, logWarn, silentLogger,
} from './logger';
import { Point } from './point';
import { PointRegistry } from './pointRegistry';
import { isSimulationPermitted } from './priorityResolver';
import { RandomSource, createRandom } from './random';
import {
  PointSimulationState, RuleContext, UPDATE_RULES, createSimulationState,
} from './simulationRules';

export interface SimulationEngineOptions {
  settings: SimulationSettings;
  /** Overrides `settings.seed`. */
  random?: RandomSource;
  logger?: Logger;
  /** Monotonic clock in milliseconds used for point update timestamps. */
  now?: () => number;
}

export interface TickReport {
  tick: number;
  elapsedSeconds: number;
  driven: number;
  blocked: number;
  unchanged: number;
  failed: number;
  environment: EnvironmentSnapshot;
}

type PointOutcome = 'driven' | 'blocked' | 'unchanged' | 'failed';

/**
 * Advances every registered point by one logical step per tick. Ticks are
 * synchronous, so external writes always land between two ticks.
 */
export class SimulationEngine {
  readonly environment: EnvironmentModel;

  private readonly registry: PointRegistry;

  private readonly settings: SimulationSettings;

  private readonly random: RandomSource;

  private readonly logger: Logger;

  private readonly now: () => number;

  private readonly states = new Map<Point, PointSimulationState>();

  private timer: ReturnType<typeof setInterval> | null = null;

  private ticks = 0;

  constructor(registry: PointRegistry, options: SimulationEngineOptions) {
    this.registry = registry;
    this.settings = options.settings;
    this.random = options.random ?? createRandom(options.settings.seed);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.environment = new EnvironmentModel(options.settings, this.random);
  }

  get tickCount(): number {
    return this.ticks;
  }

  get elapsedSeconds(): number {
    return this.environment.elapsedSeconds;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get stepInterval(): number {
    return this.settings.stepInterval;
  }

  get priorityAware(): boolean {
    return this.settings.priorityAwareSimulation;
  }

  tick(): TickReport {
    const stepSeconds = this.settings.stepInterval;
    const environment = this.environment.advance(stepSeconds);
    const context: RuleContext = {
      settings: this.settings,
      environment,
      random: this.random,
      stepSeconds,
    };
    const nowMs = this.now();
    const counts: Record<PointOutcome, number> = {
      driven: 0, blocked: 0, unchanged: 0, failed: 0,
    };

    for (const point of this.registry.all()) {
      let outcome: PointOutcome;
      try {
        outcome = this.updatePoint(point, context, nowMs);
      } catch (error) {
        logError(this.logger, `[SimulationEngine] ${point.kind}:${point.instance} update failed:`, error);
        outcome = 'failed';
      }
      counts[outcome] += 1;
    }

    this.ticks += 1;
    return {
      tick: this.ticks,
      elapsedSeconds: environment.elapsedSeconds,
      ...counts,
      environment,
    };
  }

  advance(ticks: number): TickReport | null {
    let report: TickReport | null = null;
    for (let index = 0; index < ticks; index += 1) {
      report = this.tick();
    }
    return report;
  }

  start() {
    if (this.timer) return;
    const periodMs = this.settings.stepInterval * 1000;
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        logError(this.logger, '[SimulationEngine] Tick failed:', error);
      }
    }, periodMs);
    this.logger.log(`[SimulationEngine] Started, step ${this.settings.stepInterval}s`);
  }

  /** Cancels the periodic driver. A tick already running always completes first. */
  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.log(`[SimulationEngine] Stopped after ${this.ticks} ticks`);
  }

  private stateFor(point: Point): PointSimulationState {
    let state = this.states.get(point);
    if (!state) {
      state = createSimulationState(point, this.settings, this.random);
      this.states.set(point, state);
    }
    return state;
  }

  private updatePoint(point: Point, context: RuleContext, nowMs: number): PointOutcome {
    const state = this.stateFor(point);
    const current = point.effectiveValue;

    if (!isSimulationPermitted(point.priorities, this.settings.priorityAwareSimulation)) {
      state.heldCommand = current;
      return 'blocked';
    }

    const previous = state.heldCommand ?? current;
    state.heldCommand = null;
    const next = UPDATE_RULES[point.kind](point, previous, state, context);
    if (next === current) return 'unchanged';

    const applied = point.applySimulatedValue(next, nowMs);
    if (!applied.ok) {
      logWarn(this.logger, `[SimulationEngine] ${point.kind}:${point.instance} skipped: ${applied.message}`);
      return 'failed';
    }
    return 'driven';
  }
}
