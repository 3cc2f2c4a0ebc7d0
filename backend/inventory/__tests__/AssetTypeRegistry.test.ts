import path from 'node:path';

import { loadInventoryConfig } from '../../config/InventoryConfig';
import { AssetTypeRegistry, loadAssetTypeRegistry, parseAssetTypeDefinitions } from '../AssetTypeRegistry';
import { DomainError } from '../../reliability/DomainError';

const codeOf = (fn: () => unknown): string | null => {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof DomainError ? err.code : 'not-a-domain-error';
  }
};

describe('AssetTypeRegistry', () => {
  const registry = loadAssetTypeRegistry();

  test('loads the bundled IT asset types', () => {
    expect(registry.typeNames()).toHaveLength(14);
    expect(registry.has('vm/virtualbox')).toBe(true);
    expect(registry.has('vm/kvm')).toBe(false);
    expect(registry.has(undefined)).toBe(false);
  });

  test('exposes tags, required fields and dependency patterns', () => {
    const server = registry.get('physical/server');
    expect(server?.tags.has('bottom')).toBe(true);
    expect(server?.idPrefix).toBe('srv');

    const app = registry.get('application/internal');
    expect(app?.tags.has('top')).toBe(true);
    expect(app?.requiredFields).toEqual(['location', 'owner']);

    expect(registry.get('physical/server/service')?.requiredDependencyPatterns).toEqual([
      'physical/server',
      'resource/deployment',
      'storage/.*',
    ]);
  });

  test('unknown types resolve to null', () => {
    expect(registry.get('nope')).toBeNull();
    expect(registry.get(undefined)).toBeNull();
  });

  test('prefixes shared by several types are known once', () => {
    expect(registry.hasPrefix('psvc')).toBe(true);
    expect(registry.hasPrefix('app')).toBe(true);
    expect(registry.hasPrefix('xyz')).toBe(false);
  });

  test('color defaults to white', () => {
    const r = new AssetTypeRegistry({ thing: { description: 'A thing', renderStyle: 'shape=box', idPrefix: 'thg' } });
    expect(r.get('thing')?.color).toBe('white');
    expect(r.get('thing')?.requiredFields).toEqual([]);
  });

  test('rejects unknown tags and invalid patterns', () => {
    expect(
      codeOf(
        () =>
          new AssetTypeRegistry({
            thing: { description: 'A thing', renderStyle: 'shape=box', idPrefix: 'thg', tags: ['middle'] },
          }),
      ),
    ).toBe('INVALID_TYPE_REGISTRY');

    expect(
      codeOf(
        () =>
          new AssetTypeRegistry({
            thing: { description: 'A thing', renderStyle: 'shape=box', idPrefix: 'thg', requiredDependencyPatterns: ['('] },
          }),
      ),
    ).toBe('INVALID_TYPE_REGISTRY');
  });
});

describe('parseAssetTypeDefinitions', () => {
  test('rejects a non-object document', () => {
    expect(codeOf(() => parseAssetTypeDefinitions(['backup']))).toBe('INVALID_TYPE_REGISTRY');
  });

  test('requires description, renderStyle and idPrefix', () => {
    expect(codeOf(() => parseAssetTypeDefinitions({ backup: { description: 'B', renderStyle: 'x' } }))).toBe(
      'INVALID_TYPE_REGISTRY',
    );
    expect(codeOf(() => parseAssetTypeDefinitions({ backup: { renderStyle: 'x', idPrefix: 'bak' } }))).toBe(
      'INVALID_TYPE_REGISTRY',
    );
  });

  test('trims the id prefix', () => {
    const defs = parseAssetTypeDefinitions({ backup: { description: 'B', renderStyle: 'x', idPrefix: ' bak ' } });
    expect(defs.backup?.idPrefix).toBe('bak');
  });

  test('a missing file is reported as an invalid registry', () => {
    expect(codeOf(() => loadAssetTypeRegistry('/nonexistent/types.json'))).toBe('INVALID_TYPE_REGISTRY');
  });

  test('the configured default selects the bundled catalog', () => {
    const { typesFile } = loadInventoryConfig({});
    expect(typesFile).toBeNull();
    expect(loadAssetTypeRegistry(typesFile).typeNames()).toHaveLength(14);
  });

  test('an explicit registry file is read from disk', () => {
    const file = path.join(__dirname, '..', '..', '..', 'config', 'asset-types', 'it-assets.json');
    expect(loadAssetTypeRegistry(file).typeNames()).toEqual(loadAssetTypeRegistry().typeNames());
  });
});
