import { clamp } from './numeric';
import { RandomSource, symmetric } from './random';

export interface EnvironmentOptions {
  outdoorTempBase: number;
  outdoorTempAmplitude: number;
  outdoorTempCycleMinutes: number;
  humidityBase: number;
  humidityRange: number;
  /** Largest humidity change per tick, in %RH. */
  humidityStep: number;
}

export interface EnvironmentSnapshot {
  elapsedSeconds: number;
  outdoorTemperature: number;
  outdoorHumidity: number;
}

/**
 * Shared outdoor conditions: a sinusoidal temperature cycle (°C) and a bounded
 * humidity random walk. Advanced once per engine tick.
 */
export class EnvironmentModel {
  private readonly options: EnvironmentOptions;

  private readonly random: RandomSource;

  private elapsed = 0;

  private humidity: number;

  constructor(options: EnvironmentOptions, random: RandomSource) {
    this.options = options;
    this.random = random;
    this.humidity = options.humidityBase;
  }

  get elapsedSeconds(): number {
    return this.elapsed;
  }

  get cyclePeriodSeconds(): number {
    return this.options.outdoorTempCycleMinutes * 60;
  }

  outdoorTemperature(atSeconds: number = this.elapsed): number {
    const period = this.cyclePeriodSeconds;
    if (period <= 0) return this.options.outdoorTempBase;
    return this.options.outdoorTempBase
      + this.options.outdoorTempAmplitude * Math.sin((2 * Math.PI * atSeconds) / period);
  }

  get outdoorHumidity(): number {
    return this.humidity;
  }

  advance(dtSeconds: number): EnvironmentSnapshot {
    this.elapsed += dtSeconds;
    const { humidityBase, humidityRange, humidityStep } = this.options;
    this.humidity = clamp(
      this.humidity + symmetric(this.random, humidityStep),
      humidityBase - humidityRange,
      humidityBase + humidityRange,
    );
    return this.snapshot();
  }

  snapshot(): EnvironmentSnapshot {
    return {
      elapsedSeconds: this.elapsed,
      outdoorTemperature: this.outdoorTemperature(),
      outdoorHumidity: this.humidity,
    };
  }
}
