// lib/store.ts
// On-disk cache of the latest API responses, one JSON file per resolution

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { extractErrorMessage } from './errors';
import { parsePricePayload } from './porssisahko';
import type { PricePayload } from './types';

export async function readCache(path: string): Promise<PricePayload | null> {
  try {
    const body = await readFile(path, 'utf-8');
    return parsePricePayload(body);
  } catch (error) {
    console.warn(`Cache ${path} not usable: ${extractErrorMessage(error)}`);
    return null;
  }
}

export async function writeCache(path: string, body: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, body, 'utf-8');
}
