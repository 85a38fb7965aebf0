#!/usr/bin/env node
export const DEFAULT_API_BASE = 'http://127.0.0.1:18080';

export interface CliRequest {
  method: 'GET' | 'POST';
  path: string;
  body?: Record<string, unknown>;
}

export function usage() {
  console.log('Usage: tsx scripts/virtual-device-cli.ts <command> [args] [--api <url>]');
  console.log('');
  console.log('Commands:');
  console.log('  status | summary');
  console.log('  points [kind]');
  console.log('  read <kind> <instance>');
  console.log('  write <kind> <instance> <value|null> [priority]');
  console.log('  release <kind> <instance> [priority]');
  console.log('  advance <ticks>');
  console.log('  state');
  console.log('');
  console.log('Kinds accept names (analogOutput, "Analog Output") or abbreviations (AO).');
  console.log(`The API defaults to $VIRTUAL_DEVICE_API or ${DEFAULT_API_BASE}.`);
}

export function parseApiBase(argv: string[]): { args: string[]; apiBase: string } {
  const args = [...argv];
  const fallback = process.env.VIRTUAL_DEVICE_API ?? DEFAULT_API_BASE;
  const idx = args.findIndex((entry) => entry === '--api');
  if (idx < 0) return { args, apiBase: fallback };

  const value = args[idx + 1];
  if (value && !value.startsWith('--')) {
    args.splice(idx, 2);
    return { args, apiBase: value };
  }
  args.splice(idx, 1);
  return { args, apiBase: fallback };
}

export async function callApi(base: string, request: CliRequest): Promise<unknown> {
  const response = await fetch(`${base}${request.path}`, {
    method: request.method,
    headers: { 'content-type': 'application/json' },
    body: request.body ? JSON.stringify(request.body) : undefined,
  });

  const text = await response.text();
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${text || '<empty>'}`);
  }
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (_error) {
    throw new Error(`Failed to parse API response as JSON. Body: ${text}`);
  }
}

export function parseNumber(value: string | undefined, name: string): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${name} must be numeric`);
  }
  return parsed;
}

/** Command-line value for a write: null, a boolean word or a number. */
export function parseWriteValue(value: string | undefined): number | boolean | null {
  const lower = value?.trim().toLowerCase();
  if (lower === 'null') return null;
  if (lower === 'true' || lower === 'active' || lower === 'on') return true;
  if (lower === 'false' || lower === 'inactive' || lower === 'off') return false;
  return parseNumber(value, 'value');
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) throw new Error(`${name} is required`);
  return value;
}

export function printJson(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function printSummary(payload: unknown) {
  const summary = isRecord(payload) ? payload.summary : undefined;
  if (!isRecord(summary) || !isRecord(summary.identity) || !isRecord(summary.environment)) {
    printJson(payload);
    return;
  }

  const { identity, environment } = summary;
  console.log(`Device: ${identity.deviceId} "${identity.deviceName}" (${identity.modelName})`);
  console.log(
    `Simulation: tick=${summary.tick} elapsed=${summary.elapsedSeconds}s`
    + ` running=${summary.running} priorityAware=${summary.priorityAwareSimulation}`,
  );
  console.log(
    `Outdoor: temperature=${environment.outdoorTemperature}C humidity=${environment.outdoorHumidity}%`,
  );
  if (isRecord(summary.pointCounts)) {
    const counts = Object.entries(summary.pointCounts)
      .filter(([, count]) => typeof count === 'number' && count > 0)
      .map(([kind, count]) => `${kind}=${count}`);
    console.log(`Points: ${counts.length > 0 ? counts.join(' ') : 'none'}`);
  }
}

export async function main(argv = process.argv.slice(2)) {
  const { args, apiBase } = parseApiBase(argv);
  const command = args[0];

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    usage();
    return;
  }

  switch (command) {
    case 'status':
    case 'summary':
      printSummary(await callApi(apiBase, { method: 'GET', path: '/summary' }));
      return;
    case 'state':
      printJson(await callApi(apiBase, { method: 'GET', path: '/debug/state' }));
      return;
    case 'points': {
      const kind = args[1];
      const query = kind ? `?kind=${encodeURIComponent(kind)}` : '';
      printJson(await callApi(apiBase, { method: 'GET', path: `/points${query}` }));
      return;
    }
    case 'read': {
      const kind = requireArg(args[1], 'kind');
      const instance = parseNumber(args[2], 'instance');
      printJson(await callApi(apiBase, {
        method: 'GET',
        path: `/points/${encodeURIComponent(kind)}/${instance}`,
      }));
      return;
    }
    case 'write': {
      const kind = requireArg(args[1], 'kind');
      const instance = parseNumber(args[2], 'instance');
      const value = parseWriteValue(args[3]);
      const priority = args[4] === undefined ? undefined : parseNumber(args[4], 'priority');
      printJson(await callApi(apiBase, {
        method: 'POST',
        path: '/points/write',
        body: {
          kind, instance, value, priority,
        },
      }));
      return;
    }
    case 'release': {
      const kind = requireArg(args[1], 'kind');
      const instance = parseNumber(args[2], 'instance');
      const priority = args[3] === undefined ? undefined : parseNumber(args[3], 'priority');
      printJson(await callApi(apiBase, {
        method: 'POST',
        path: '/points/relinquish',
        body: { kind, instance, priority },
      }));
      return;
    }
    case 'advance': {
      const ticks = parseNumber(args[1], 'ticks');
      printJson(await callApi(apiBase, { method: 'POST', path: '/debug/advance', body: { ticks } }));
      return;
    }
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

const isMainModule = typeof require !== 'undefined'
  && typeof module !== 'undefined'
  && require.main === module;

if (isMainModule) {
  main().catch((error) => {
    console.error(String(error));
    process.exitCode = 1;
  });
}
