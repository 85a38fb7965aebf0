#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import sourceMapSupport from 'source-map-support';

import { VirtualDeviceConfig, loadConfigFile } from '../lib/config';
import { Logger, consoleLogger, logWarn } from '../lib/logger';
import { POINT_KINDS, POINT_KIND_TRAITS } from '../lib/pointKinds';
import {
  PointsLoadReport, groupFailuresByMessage, loadPointsFile, registerPoints,
} from '../lib/pointsLoader';
import { VirtualDevice, identityFromSettings } from '../lib/virtualDevice';
import { VirtualApiServer } from './virtual-device/apiServer';
import { VirtualBacnetServer } from './virtual-device/bacnetServer';

sourceMapSupport.install();

export const DEFAULT_CONFIG_PATH = path.join('config', 'virtual_device.ini');
export const DEFAULT_API_PORT = 18080;

export interface CliOptions {
  configPath: string;
  pointsFile?: string;
  bindAddress?: string;
  bacnetPort?: number;
  deviceId?: number;
  deviceName?: string;
  apiHost: string;
  apiPort: number;
  seed?: number;
  legacySimulation: boolean;
  logTraffic: boolean;
  periodicIAmMs: number;
}

export interface RunningVirtualDevice {
  shutdown: () => Promise<void>;
  config: VirtualDeviceConfig;
  device: VirtualDevice;
  bacnetServer: VirtualBacnetServer;
  apiServer: VirtualApiServer;
  pointsReport: PointsLoadReport;
}

/** Parses a numeric flag value; absent values take the fallback, garbage throws. */
export function parseNumber(value: string | undefined, fallback: number, flag: string): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${flag} must be numeric, got "${value}"`);
  }
  return parsed;
}

function optionalNumber(value: string | undefined, flag: string): number | undefined {
  return value === undefined ? undefined : parseNumber(value, 0, flag);
}

export function parseArgs(argv: string[]): CliOptions {
  const args = new Map<string, string>();
  const valueFlags = new Set<string>([
    '--config',
    '--points',
    '--bind',
    '--port',
    '--device-id',
    '--name',
    '--api-host',
    '--api-port',
    '--seed',
    '--periodic-iam-ms',
  ]);
  for (let index = 0; index < argv.length; index += 1) {
    const part = argv[index];
    if (!part.startsWith('--')) continue;
    const next = argv[index + 1];
    if (valueFlags.has(part)) {
      if (!next || next.startsWith('--')) {
        throw new Error(`Missing value for ${part}`);
      }
      args.set(part, next);
      index += 1;
      continue;
    }
    args.set(part, 'true');
  }

  return {
    configPath: args.get('--config') ?? DEFAULT_CONFIG_PATH,
    pointsFile: args.get('--points'),
    bindAddress: args.get('--bind'),
    bacnetPort: optionalNumber(args.get('--port'), '--port'),
    deviceId: optionalNumber(args.get('--device-id'), '--device-id'),
    deviceName: args.get('--name'),
    apiHost: args.get('--api-host') ?? '127.0.0.1',
    apiPort: parseNumber(args.get('--api-port'), DEFAULT_API_PORT, '--api-port'),
    seed: optionalNumber(args.get('--seed'), '--seed'),
    legacySimulation: args.get('--legacy-simulation') === 'true',
    logTraffic: args.get('--quiet') !== 'true',
    periodicIAmMs: parseNumber(args.get('--periodic-iam-ms'), 0, '--periodic-iam-ms'),
  };
}

/** Command-line flags win over the INI file. */
export function applyOverrides(config: VirtualDeviceConfig, options: CliOptions): VirtualDeviceConfig {
  return {
    device: {
      ...config.device,
      address: options.bindAddress ?? config.device.address,
      port: options.bacnetPort ?? config.device.port,
      deviceId: options.deviceId ?? config.device.deviceId,
      deviceName: options.deviceName ?? config.device.deviceName,
    },
    simulation: {
      ...config.simulation,
      seed: options.seed ?? config.simulation.seed,
      priorityAwareSimulation: options.legacySimulation ? false : config.simulation.priorityAwareSimulation,
    },
    pointsFile: options.pointsFile ? path.resolve(options.pointsFile) : config.pointsFile,
  };
}

export function printUsage() {
  console.log('Usage: tsx scripts/virtual-device.ts [options]');
  console.log('');
  console.log('Options:');
  console.log(`  --config <file>            INI configuration (default ${DEFAULT_CONFIG_PATH})`);
  console.log('  --points <file>            Points CSV, overrides [data] points_file');
  console.log('  --bind <ip>                Bind the BACnet UDP socket to an interface address');
  console.log('  --port <port>              BACnet UDP port (default from config, 47809)');
  console.log('  --device-id <n>            BACnet device instance');
  console.log('  --name <string>            BACnet device object name');
  console.log('  --api-host <host>          HTTP API host (default 127.0.0.1)');
  console.log(`  --api-port <port>          HTTP API port (default ${DEFAULT_API_PORT})`);
  console.log('  --seed <n>                 Seed the simulation for reproducible runs');
  console.log('  --legacy-simulation        Simulate even when a higher priority slot is set');
  console.log('  --periodic-iam-ms <ms>     Periodic I-Am broadcast interval (0 disables)');
  console.log('  --quiet                    Disable BACnet traffic logs');
}

function loadPoints(device: VirtualDevice, pointsFile: string, logger: Logger): PointsLoadReport {
  if (!fs.existsSync(pointsFile)) {
    logWarn(logger, `[VirtualDevice] Points file ${pointsFile} not found, starting with no points`);
    return { registered: 0, failures: [] };
  }

  const report = registerPoints(device.registry, loadPointsFile(pointsFile));
  for (const [message, failures] of groupFailuresByMessage(report.failures)) {
    const rows = failures.map((failure) => failure.row).join(', ');
    logWarn(logger, `[VirtualDevice] Skipped ${failures.length} row(s) (${rows}): ${message}`);
  }
  logger.log(`[VirtualDevice] Loaded ${report.registered} points from ${pointsFile}`);
  return report;
}

export async function startVirtualDevice(
  options: CliOptions,
  registerSignalHandlers = true,
  logger: Logger = consoleLogger,
): Promise<RunningVirtualDevice> {
  const loaded = loadConfigFile(options.configPath);
  for (const warning of loaded.warnings) logWarn(logger, `[VirtualDevice] ${warning}`);
  const config = applyOverrides(loaded.config, options);

  const device = new VirtualDevice({
    identity: identityFromSettings(config.device),
    settings: config.simulation,
    logger,
  });
  const pointsReport = loadPoints(device, config.pointsFile, logger);

  const bacnetServer = new VirtualBacnetServer(device, {
    port: config.device.port,
    bindAddress: config.device.address,
    logTraffic: options.logTraffic,
    periodicIAmMs: options.periodicIAmMs,
    logger,
  });
  bacnetServer.start();

  const apiServer = new VirtualApiServer(device, {
    host: options.apiHost,
    port: options.apiPort,
    logger,
  });
  try {
    await apiServer.start();
  } catch (error) {
    bacnetServer.stop();
    throw error;
  }

  device.engine.start();

  const { identity } = device;
  const counts = device.registry.countByKind();
  const countText = POINT_KINDS
    .filter((kind) => counts[kind] > 0)
    .map((kind) => `${POINT_KIND_TRAITS[kind].abbreviation}=${counts[kind]}`)
    .join(' ');
  logger.log(`[VirtualDevice] Device ${identity.deviceId} "${identity.deviceName}" model="${identity.modelName}"`);
  logger.log(`[VirtualDevice] BACnet listening on ${config.device.address ?? '0.0.0.0'}:${config.device.port}`);
  logger.log(`[VirtualDevice] API at http://${options.apiHost}:${apiServer.port ?? options.apiPort}`);
  logger.log(
    `[VirtualDevice] Step ${config.simulation.stepInterval}s,`
    + ` ${config.simulation.priorityAwareSimulation ? 'priority-aware' : 'legacy'} simulation`
    + `${config.simulation.seed === undefined ? '' : `, seed ${config.simulation.seed}`}`,
  );
  logger.log(`[VirtualDevice] Points: ${countText || 'none'}`);

  let stopped: Promise<void> | null = null;
  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('[VirtualDevice] Shutdown failed:', error);
      process.exitCode = 1;
    });
  };
  const shutdown = (): Promise<void> => {
    if (stopped) return stopped;
    if (registerSignalHandlers) {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
    device.engine.stop();
    bacnetServer.stop();
    stopped = apiServer.stop().then(() => {
      logger.log(`[VirtualDevice] Stopped after ${device.engine.tickCount} ticks`);
    });
    return stopped;
  };

  if (registerSignalHandlers) {
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  return {
    shutdown,
    config,
    device,
    bacnetServer,
    apiServer,
    pointsReport,
  };
}

export async function main(argv = process.argv.slice(2)) {
  if (argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    return null;
  }

  const options = parseArgs(argv);
  return startVirtualDevice(options, true);
}

const isMainModule = typeof require !== 'undefined'
  && typeof module !== 'undefined'
  && require.main === module;

if (isMainModule) {
  main().catch((error) => {
    console.error('[VirtualDevice] Fatal startup error:', error);
    process.exitCode = 1;
  });
}
