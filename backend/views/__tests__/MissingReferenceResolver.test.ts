import { annotate, makeAsset, sampleEstate } from '../../../tests/helpers/inventoryFixtures';
import { PLACEHOLDER_NAME, resolvePlaceholders } from '../MissingReferenceResolver';

describe('resolvePlaceholders', () => {
  const assets = annotate(sampleEstate());
  const pick = (...ids: string[]) => assets.filter((a) => ids.includes(a.id));

  test('numbers subset assets first, then one placeholder per missing dependency', () => {
    const view = resolvePlaceholders(pick('srv_1', 'psvc_1', 'app_1'));

    expect(view.nodes.map((n) => [n.nodeId, n.id, n.kind])).toEqual([
      ['n0', 'srv_1', 'asset'],
      ['n1', 'psvc_1', 'asset'],
      ['n2', 'app_1', 'asset'],
      ['n3', 'missing_1', 'placeholder'],
    ]);
    expect(view.placeholderIds).toEqual(['missing_1']);
    expect(view.nodeById.get('missing_1')?.name).toBe(PLACEHOLDER_NAME);
  });

  test('edges run from dependency to dependent and keep commentary', () => {
    const view = resolvePlaceholders(pick('srv_1', 'psvc_1', 'app_1'));

    expect(view.edges.map((e) => [e.fromNodeId, e.toNodeId, e.commentary])).toEqual([
      ['n0', 'n1', ''],
      ['n1', 'n2', 'serves it'],
      ['n3', 'n2', ''],
    ]);
  });

  test('assets outside the subset become placeholders too', () => {
    const view = resolvePlaceholders(pick('app_1'));
    expect(view.placeholderIds).toEqual(['psvc_1', 'missing_1']);
    expect(view.nodes.map((n) => n.nodeId)).toEqual(['n0', 'n1', 'n2']);
  });

  test('a dependency shared by several assets gets a single placeholder', () => {
    const shared = annotate([
      makeAsset('con_1', 'container/docker', ['dply_gone']),
      makeAsset('con_2', 'container/docker', ['dply_gone INSUF stale']),
    ]);
    const view = resolvePlaceholders(shared);

    expect(view.placeholderIds).toEqual(['dply_gone']);
    expect(view.edges.map((e) => [e.fromNodeId, e.toNodeId, e.insufficient])).toEqual([
      ['n2', 'n0', false],
      ['n2', 'n1', true],
    ]);
  });

  test('exclusions are neither edges nor placeholders', () => {
    const view = resolvePlaceholders(annotate([makeAsset('psvc_1', 'physical/server/service', ['^resource/deployment'])]));
    expect(view.nodes).toHaveLength(1);
    expect(view.edges).toEqual([]);
    expect(view.placeholderIds).toEqual([]);
  });
});
