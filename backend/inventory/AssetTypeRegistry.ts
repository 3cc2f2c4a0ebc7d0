import fs from 'node:fs';

import itAssetTypes from '../../config/asset-types/it-assets.json';
import { DomainError } from '../reliability/DomainError';
import { isAssetTypeTag, type AssetType, type AssetTypeDefinition, type AssetTypeTag } from './AssetType';

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === 'string');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const invalid = (typeName: string, problem: string): DomainError =>
  new DomainError({
    code: 'INVALID_TYPE_REGISTRY',
    message: `Asset type "${typeName}" ${problem}.`,
    details: { typeName },
  });

const freezeType = (typeName: string, def: AssetTypeDefinition): AssetType => {
  const tags = new Set<AssetTypeTag>();
  for (const tag of def.tags ?? []) {
    if (!isAssetTypeTag(tag)) throw invalid(typeName, `has unknown tag "${tag}"`);
    tags.add(tag);
  }

  for (const pattern of def.requiredDependencyPatterns ?? []) {
    try {
      new RegExp(pattern);
    } catch (err) {
      throw new DomainError({
        code: 'INVALID_TYPE_REGISTRY',
        message: `Asset type "${typeName}" has an invalid dependency pattern "${pattern}".`,
        details: { typeName, pattern },
        cause: err,
      });
    }
  }

  return Object.freeze({
    description: def.description,
    renderStyle: def.renderStyle,
    color: def.color ?? 'white',
    tags,
    requiredFields: Object.freeze([...(def.requiredFields ?? [])]),
    requiredDependencyPatterns: Object.freeze([...(def.requiredDependencyPatterns ?? [])]),
    idPrefix: def.idPrefix,
  });
};

/**
 * AssetTypeRegistry (read-only catalog).
 *
 * Built once per run; lookups for unknown types return null rather than throw,
 * so every caller decides how to degrade.
 */
export class AssetTypeRegistry {
  private readonly types: ReadonlyMap<string, AssetType>;
  private readonly prefixes: ReadonlyMap<string, string>;

  constructor(definitions: Readonly<Record<string, AssetTypeDefinition>>) {
    const types = new Map<string, AssetType>();
    const prefixes = new Map<string, string>();
    for (const [typeName, def] of Object.entries(definitions)) {
      const frozen = freezeType(typeName, def);
      types.set(typeName, frozen);
      // Several types may share one prefix (e.g. the two psvc service kinds).
      if (!prefixes.has(frozen.idPrefix)) prefixes.set(frozen.idPrefix, frozen.description);
    }
    this.types = types;
    this.prefixes = prefixes;
  }

  has(typeName: string | undefined): boolean {
    return typeName !== undefined && this.types.has(typeName);
  }

  get(typeName: string | undefined): AssetType | null {
    if (typeName === undefined) return null;
    return this.types.get(typeName) ?? null;
  }

  hasPrefix(prefix: string): boolean {
    return this.prefixes.has(prefix);
  }

  typeNames(): string[] {
    return Array.from(this.types.keys());
  }

  entries(): Array<[string, AssetType]> {
    return Array.from(this.types.entries());
  }
}

/** Validates raw JSON (already parsed) into registry definitions. */
export const parseAssetTypeDefinitions = (raw: unknown): Record<string, AssetTypeDefinition> => {
  if (!isRecord(raw)) {
    throw new DomainError({
      code: 'INVALID_TYPE_REGISTRY',
      message: 'Type registry must be an object keyed by asset type.',
    });
  }

  const out: Record<string, AssetTypeDefinition> = {};
  for (const [typeName, value] of Object.entries(raw)) {
    if (!isRecord(value)) throw invalid(typeName, 'must be an object');

    const { description, renderStyle, color, tags, requiredFields, requiredDependencyPatterns, idPrefix } = value;
    if (typeof description !== 'string') throw invalid(typeName, 'is missing "description"');
    if (typeof renderStyle !== 'string') throw invalid(typeName, 'is missing "renderStyle"');
    if (typeof idPrefix !== 'string' || !idPrefix.trim()) throw invalid(typeName, 'is missing "idPrefix"');
    if (color !== undefined && typeof color !== 'string') throw invalid(typeName, 'has a non-string "color"');
    if (tags !== undefined && !isStringList(tags)) throw invalid(typeName, 'has non-string "tags"');
    if (requiredFields !== undefined && !isStringList(requiredFields))
      throw invalid(typeName, 'has non-string "requiredFields"');
    if (requiredDependencyPatterns !== undefined && !isStringList(requiredDependencyPatterns))
      throw invalid(typeName, 'has non-string "requiredDependencyPatterns"');

    out[typeName] = {
      description,
      renderStyle,
      color,
      tags,
      requiredFields,
      requiredDependencyPatterns,
      idPrefix: idPrefix.trim(),
    };
  }
  return out;
};

/**
 * Reads a registry file; with no path, the bundled IT asset catalog is used.
 * The catalog is imported so the build emits it beside the compiled code.
 */
export const loadAssetTypeRegistry = (filePath?: string | null): AssetTypeRegistry => {
  if (!filePath) return new AssetTypeRegistry(parseAssetTypeDefinitions(itAssetTypes));

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new DomainError({
      code: 'INVALID_TYPE_REGISTRY',
      message: `Failed reading type registry ${filePath}.`,
      details: { filePath },
      cause: err,
    });
  }
  return new AssetTypeRegistry(parseAssetTypeDefinitions(raw));
};
