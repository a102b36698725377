import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { JsonObject } from '../../types.js';

export const FIXTURES_DIR = fileURLToPath(new URL('../../../tests/fixtures/', import.meta.url));

export const ORG_UUID = 'b3476cb9-2e3d-41a6-98d0-0f47421a65b6';

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function loadFixture(name: string): JsonObject {
  return JSON.parse(fs.readFileSync(fixturePath(name), 'utf-8'));
}

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Decode the nth call made to a fetch mock
 */
export function requestAt(
  calls: ReadonlyArray<Parameters<typeof fetch>>,
  index: number
): { url: URL; method: string | undefined; headers: Headers; body: unknown } {
  const [input, init] = calls[index];
  return {
    url: new URL(String(input)),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}
