/**
 * Shared fixtures for CLI command tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FetchLike } from '@nowcast/forecasting';

export const TEST_BASE_URL = 'https://api.test.local';

export const TEST_ENV = { NIXTLA_API_KEY: 'test-key' };

export interface StubCall {
  route: string;
  body: unknown;
}

export interface FetchStub {
  fetch: FetchLike;
  calls: StubCall[];
}

/**
 * Fetch stub keyed on `METHOD path`; unknown routes answer 404
 */
export function stubFetch(routes: Record<string, (body: unknown) => Response>): FetchStub {
  const calls: StubCall[] = [];
  const fetch: FetchLike = async (input, init) => {
    const url = new URL(String(input));
    const route = `${init?.method ?? 'GET'} ${url.pathname.replace(/^\//, '')}`;
    const raw = init?.body;
    const body: unknown = typeof raw === 'string' ? JSON.parse(raw) : undefined;
    calls.push({ route, body });
    const handler = routes[route];
    return handler ? handler(body) : json({ detail: `no handler for ${route}` }, 404);
  };
  return { fetch, calls };
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/**
 * Temporary directory holding JSON input files
 */
export function tempDir(): { path: (name: string) => string; write: (name: string, value: unknown) => string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'nowcast-cli-'));
  return {
    path: (name) => join(dir, name),
    write: (name, value) => {
      const file = join(dir, name);
      writeFileSync(file, JSON.stringify(value), 'utf-8');
      return file;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
