import { buildDependencyGraph } from '../../graph/DependencyGraph';
import { createAsset } from '../../inventory/Asset';
import { classifyDependents } from '../DependentTiers';

const makeAsset = (id: string, dependsOn: string[] = []) => createAsset({ id, type: 'backup', dependsOn });

describe('classifyDependents', () => {
  const graph = buildDependencyGraph([
    makeAsset('srv_1'),
    makeAsset('psvc_1', ['srv_1']),
    makeAsset('con_1', ['psvc_1']),
    makeAsset('app_1', ['con_1']),
    makeAsset('drv_1', ['srv_1']),
    makeAsset('app_2', ['con_1', 'psvc_1']),
  ]);

  test('splits dependents into direct, intermediate and final tiers', () => {
    expect(classifyDependents('srv_1', graph)).toEqual({
      direct: ['drv_1', 'psvc_1'],
      intermediate: ['con_1'],
      final: ['app_1', 'app_2', 'drv_1'],
    });
  });

  test('a direct dependent with nothing above it is also final', () => {
    expect(classifyDependents('con_1', graph)).toEqual({
      direct: ['app_1', 'app_2'],
      intermediate: [],
      final: ['app_1', 'app_2'],
    });
  });

  test('an asset nothing depends on has empty tiers', () => {
    expect(classifyDependents('app_1', graph)).toEqual({ direct: [], intermediate: [], final: [] });
  });

  test('undefined ids are classified by whoever lists them', () => {
    const g = buildDependencyGraph([makeAsset('db_1', ['ghost_1'])]);
    expect(classifyDependents('ghost_1', g)).toEqual({ direct: ['db_1'], intermediate: [], final: ['db_1'] });
  });
});
