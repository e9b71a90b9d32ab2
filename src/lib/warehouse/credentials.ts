import { promises as fs } from 'fs';

import type { ServiceAccountKey } from './types';

type JsonObject = Record<string, unknown>;

export async function loadServiceAccountKey(path: string): Promise<ServiceAccountKey> {
  let contents: string;

  try {
    contents = await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new Error(`Couldn't read key file ${path}: ${describeError(error)}`);
  }

  return parseServiceAccountKey(contents, path);
}

export function parseServiceAccountKey(contents: string, source: string): ServiceAccountKey {
  let parsed: unknown;

  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new Error(`Malformed key file ${source}: ${describeError(error)}`);
  }

  const key = asObject(parsed);

  if (!key) {
    throw new Error(`Malformed key file ${source}: expected a JSON object`);
  }

  const clientEmail = readString(key.client_email);
  const privateKey = readString(key.private_key);

  if (!clientEmail || !privateKey) {
    throw new Error(`Malformed key file ${source}: client_email and private_key are required`);
  }

  const projectId = readString(key.project_id);

  return projectId
    ? { client_email: clientEmail, private_key: privateKey, project_id: projectId }
    : { client_email: clientEmail, private_key: privateKey };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asObject(value: unknown): JsonObject | undefined {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return;
  }

  return value as JsonObject;
}

function readString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? value : undefined;
}
