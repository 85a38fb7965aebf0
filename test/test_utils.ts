import net from 'net';

import { DEFAULT_SIMULATION_SETTINGS, SimulationSettings } from '../lib/config';

export function testSettings(overrides: Partial<SimulationSettings> = {}): SimulationSettings {
  return { ...DEFAULT_SIMULATION_SETTINGS, ...overrides };
}

/** Reserves and releases an ephemeral port on the loopback interface. */
export async function getFreePort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  if (!address || typeof address === 'string') {
    throw new Error('Failed to determine free port');
  }
  return address.port;
}
