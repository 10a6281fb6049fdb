/**
 * `tasksync status` — Check that a running server answers its health check.
 */

import axios from 'axios';
import { Command } from 'commander';

export interface HealthStatus {
  ok: boolean;
  service?: string;
  version?: string;
  error?: string;
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

export async function checkHealth(url: string): Promise<HealthStatus> {
  const base = url.replace(/\/+$/, '');
  try {
    const response = await axios.get<unknown>(`${base}/health`, { timeout: 5000 });
    if (readString(response.data, 'status') !== 'ok') {
      return { ok: false, error: 'Unexpected health response' };
    }
    return {
      ok: true,
      service: readString(response.data, 'service'),
      version: readString(response.data, 'version'),
    };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function createStatusCommand(): Command {
  const cmd = new Command('status');

  cmd
    .description('Check whether a server is up')
    .option('-u, --url <url>', 'Server base URL', 'http://localhost:3030')
    .action(async (options: { url: string }) => {
      const status = await checkHealth(options.url);
      if (status.ok) {
        console.log(`✓ ${options.url} is up (${status.service ?? 'unknown'} ${status.version ?? ''})`.trimEnd());
      } else {
        console.error(`✗ ${options.url} is not reachable: ${status.error ?? 'unknown error'}`);
        process.exitCode = 1;
      }
    });

  return cmd;
}
