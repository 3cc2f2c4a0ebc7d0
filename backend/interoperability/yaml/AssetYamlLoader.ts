import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';

import { createAsset, type Asset, type AssetFieldValue } from '../../inventory/Asset';
import { DomainError } from '../../reliability/DomainError';

/** One asset file: optional `general` section plus its records. */
export type AssetDocument = {
  filePath: string;
  title?: string;
  assets: Asset[];
};

const CORE_KEYS = new Set(['id', 'type', 'name', 'depends_on', 'tags']);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const scalarText = (value: unknown): string | null => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
};

const invalidRecord = (filePath: string, index: number, message: string, id?: string): DomainError =>
  new DomainError({
    code: 'INVALID_ASSET_RECORD',
    message: `${filePath} asset #${index}${id ? ` (${id})` : ''}: ${message}`,
    details: { filePath, index, id },
  });

const stringList = (value: unknown, key: string, fail: (m: string) => DomainError): string[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw fail(`"${key}" must be a list`);
  return value.map((item) => {
    const text = scalarText(item);
    if (text === null) throw fail(`"${key}" entries must be text`);
    return text;
  });
};

const toAsset = (raw: unknown, filePath: string, index: number, title: string | undefined): Asset => {
  if (!isRecord(raw)) throw invalidRecord(filePath, index, 'record must be a mapping');

  const id = scalarText(raw.id)?.trim() ?? '';
  if (!id) throw invalidRecord(filePath, index, 'record has no "id"');
  const fail = (message: string) => invalidRecord(filePath, index, message, id);

  const type = raw.type === undefined || raw.type === null ? undefined : scalarText(raw.type);
  if (type === null) throw fail('"type" must be text');
  const name = raw.name === undefined || raw.name === null ? id : scalarText(raw.name);
  if (name === null) throw fail('"name" must be text');

  const fields: Record<string, AssetFieldValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (CORE_KEYS.has(key) || value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      fields[key] = stringList(value, key, fail);
      continue;
    }
    const text = scalarText(value);
    if (text === null) throw fail(`"${key}" must be text or a list of text`);
    fields[key] = text;
  }

  return createAsset({
    id,
    type,
    name,
    dependsOn: stringList(raw.depends_on, 'depends_on', fail),
    tags: stringList(raw.tags, 'tags', fail),
    fields,
    source: { filePath, index, title },
  });
};

/**
 * Parses asset YAML text.
 *
 * Layout: `general: { title }` and `assets: [ ... ]`. An empty document yields
 * no assets; a malformed record throws INVALID_ASSET_RECORD naming file and
 * position.
 */
export function parseAssetDocument(text: string, filePath: string): AssetDocument {
  let data: unknown;
  try {
    data = parse(text);
  } catch (err) {
    throw new DomainError({
      code: 'INVALID_ASSET_RECORD',
      message: `Failed reading ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      details: { filePath },
      cause: err,
    });
  }

  if (data === null || data === undefined) return { filePath, assets: [] };
  if (!isRecord(data)) {
    throw new DomainError({
      code: 'INVALID_ASSET_RECORD',
      message: `${filePath}: top level must be a mapping with an "assets" list`,
      details: { filePath },
    });
  }

  const general = isRecord(data.general) ? data.general : undefined;
  const title = scalarText(general?.title) ?? undefined;

  const rawAssets = data.assets ?? [];
  if (!Array.isArray(rawAssets)) {
    throw new DomainError({
      code: 'INVALID_ASSET_RECORD',
      message: `${filePath}: "assets" must be a list`,
      details: { filePath },
    });
  }

  return {
    filePath,
    title,
    assets: rawAssets.map((raw, index) => toAsset(raw, filePath, index, title)),
  };
}

export function loadAssetFile(file: string): AssetDocument {
  const filePath = path.resolve(file);
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new DomainError({
      code: 'NOT_FOUND',
      message: `Failed reading ${filePath}.`,
      details: { filePath },
      cause: err,
    });
  }
  return parseAssetDocument(text, filePath);
}

export const loadAssetFiles = (files: readonly string[]): AssetDocument[] => files.map(loadAssetFile);
