import { propagateDependentIds, propagateDependentTypes } from '../../backend/analysis/DependentPropagation';
import { buildDependencyGraph } from '../../backend/graph/DependencyGraph';
import { annotateAssets, type AnnotatedAsset } from '../../backend/inventory/AnnotatedAsset';
import { createAsset, type Asset, type AssetFieldValue } from '../../backend/inventory/Asset';

export const makeAsset = (
  id: string,
  type: string | undefined,
  dependsOn: string[] = [],
  extra?: { name?: string; tags?: string[]; fields?: Record<string, AssetFieldValue>; filePath?: string },
): Asset =>
  createAsset({
    id,
    type,
    name: extra?.name,
    dependsOn,
    tags: extra?.tags,
    fields: extra?.fields,
    source: { filePath: extra?.filePath ?? '/inv/assets.yaml', index: 0 },
  });

/** Builds the graph and both label annotations, as the pipeline does. */
export const annotate = (assets: readonly Asset[]): AnnotatedAsset[] => {
  const graph = buildDependencyGraph(assets);
  return annotateAssets(assets, graph, {
    dependentTypes: propagateDependentTypes(graph),
    dependentIds: propagateDependentIds(graph),
  });
};

/**
 * Small estate:
 *
 *     app_1 -> psvc_1 -> srv_1 <- drv_1
 *     app_1 -> missing_1
 *     bak_1 <-> sto_1 -> srv_1
 */
export const sampleEstate = (): Asset[] => [
  makeAsset('srv_1', 'physical/server'),
  makeAsset('psvc_1', 'physical/server/service', ['srv_1']),
  makeAsset('app_1', 'application/internal', ['psvc_1 serves it', 'missing_1'], {
    name: 'Team wiki',
    fields: { location: 'https://wiki.example.test', owner: 'ops' },
  }),
  makeAsset('bak_1', 'backup', ['sto_1']),
  makeAsset('sto_1', 'storage/local', ['bak_1', 'srv_1']),
  makeAsset('drv_1', 'drive', ['srv_1']),
];

export const idsOf = (assets: readonly { id: string }[]) => assets.map((a) => a.id);
