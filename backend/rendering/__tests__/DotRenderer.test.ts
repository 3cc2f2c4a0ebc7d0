import { annotate, makeAsset } from '../../../tests/helpers/inventoryFixtures';
import { loadAssetTypeRegistry } from '../../inventory/AssetTypeRegistry';
import { IssueReport } from '../../validation/IssueReport';
import { issue } from '../../validation/ValidationIssue';
import { resolvePlaceholders } from '../../views/MissingReferenceResolver';
import { assetTooltip, editUrl, escapeDot, htmlFileName, renderDot, renderTypeKey, wrapNodeLabel } from '../DotRenderer';
import { DARK_THEME, LIGHT_THEME } from '../DotTheme';

const registry = loadAssetTypeRegistry();

const LIGHT_HEADER = [
  'digraph Assets {',
  '  graph [rankdir=LR, concentrate=true, URL="index.html"',
  '       label="Estate updated Today", fontname=FreeSans, tooltip=" "]',
  '  node [fontname=FreeSans, fontsize=10]',
  '  edge [fontname=FreeSans, fontsize=10]',
];

describe('DOT text helpers', () => {
  test('escapeDot escapes quotes and lone backslashes but keeps \\n breaks', () => {
    expect(escapeDot('say "hi"')).toBe('say \\"hi\\"');
    expect(escapeDot('C:\\dir')).toBe('C:\\\\dir');
    expect(escapeDot('a\\nb')).toBe('a\\nb');
  });

  test('wrapNodeLabel breaks long labels near the middle', () => {
    expect(wrapNodeLabel('Web server')).toBe('Web server');
    expect(wrapNodeLabel('Primary database server')).toBe('Primary\\n database server');
    expect(wrapNodeLabel('abcdefghijklmnopqrstuvwxyz')).toBe('abcdefghijklmnopqrstuvwxyz');
  });

  test('page and edit links', () => {
    const asset = makeAsset('srv 1', 'physical/server');
    expect(htmlFileName(asset)).toBe('srv_1.html');
    expect(editUrl(asset)).toBe('asset-edit:///inv/assets.yaml#srv 1');
    expect(editUrl(asset, 'vscode')).toBe('vscode:///inv/assets.yaml#srv 1');
  });

  test('tooltips list issues, text fields, list fields and the source file', () => {
    const asset = makeAsset('sto_1', 'storage/local', ['bak_1 nightly'], {
      tags: ['needs_work'],
      fields: { location: '/srv/data', notes: ['RAID1'] },
    });
    const issues = new IssueReport();
    issues.set('sto_1', [issue('WARNING', 'NEEDS_WORK', "Has 'needs_work' tag")]);

    expect(assetTooltip(asset, issues)).toEqual([
      "WARNING Has 'needs_work' tag",
      'id: sto_1',
      'type: storage/local',
      'name: sto_1',
      'location: /srv/data',
      'DEPENDS_ON',
      '  bak_1 nightly',
      'NOTES',
      '  RAID1',
      'TAGS',
      '  needs_work',
      'Defined in /inv/assets.yaml',
    ]);
  });
});

describe('renderDot', () => {
  const assets = annotate([
    makeAsset('srv_1', 'physical/server', [], { name: 'Web server' }),
    makeAsset('app_1', 'application/internal', ['srv_1', 'missing_1'], { name: 'Team wiki' }),
  ]);
  const issues = new IssueReport();
  issues.set('app_1', [issue('WARNING', 'UNDEFINED_DEPENDENCY', 'Depends on undefined asset ID=missing_1')]);

  test('renders placeholders, nodes and edges', () => {
    const dot = renderDot(resolvePlaceholders(assets), {
      title: 'Estate updated Today',
      top: '',
      theme: LIGHT_THEME,
      registry,
      issues,
    });

    expect(dot.split('\n')).toEqual([
      ...LIGHT_HEADER,
      '  n2 [label="???", shape=doubleoctagon, fillcolor="pink", style=filled]',
      '  n0 [label="Web server", URL="srv_1.html", target="_srv_1", shape=box, width=1, ' +
        'tooltip="id: srv_1\\ntype: physical/server\\nname: Web server\\nDefined in /inv/assets.yaml"]',
      '  n1 [label="Team wiki", URL="app_1.html", target="_app_1", shape=oval, width=1.5, rank=max, peripheries=2, ' +
        'style="filled", fillcolor="pink", ' +
        'tooltip="WARNING Depends on undefined asset ID=missing_1\\nid: app_1\\ntype: application/internal\\n' +
        'name: Team wiki\\nDEPENDS_ON\\n  srv_1\\n  missing_1\\nDefined in /inv/assets.yaml"]',
      '  n0 -> n1 [fontcolor="#c0c0c0", headURL="asset-edit:///inv/assets.yaml#app_1", headlabel="edit", ' +
        'headtooltip="Edit", tailURL="asset-edit:///inv/assets.yaml#srv_1", taillabel="edit", tailtooltip="Edit"]',
      '  n2 -> n1 [fontcolor="#c0c0c0"]',
      '}',
    ]);
  });

  test('unknown types are drawn as plain boxes and the dark theme recolors errors', () => {
    const odd = annotate([makeAsset('zzz_1', 'vm/kvm', ['gone_1'])]);
    const dot = renderDot(resolvePlaceholders(odd), {
      title: 'T',
      top: '../',
      theme: DARK_THEME,
      registry,
      issues: new IssueReport(),
    });
    const lines = dot.split('\n');

    expect(lines[1]).toBe('  graph [rankdir=LR, concentrate=true, URL="../index.html"');
    expect(lines).toContain('  n1 [label="???", shape=doubleoctagon, fillcolor="#200000", style=filled]');
    expect(lines).toContain(
      '  n0 [label="zzz_1", URL="../zzz_1.html", target="_zzz_1", shape=box, ' +
        'tooltip="id: zzz_1\\ntype: vm/kvm\\nname: zzz_1\\nDEPENDS_ON\\n  gone_1\\nDefined in /inv/assets.yaml"]',
    );
  });

  test('quotes in titles are escaped', () => {
    const dot = renderDot(resolvePlaceholders([]), {
      title: 'The "main" estate',
      top: '',
      theme: LIGHT_THEME,
      registry,
      issues: new IssueReport(),
    });
    expect(dot.split('\n')[2]).toBe('       label="The \\"main\\" estate", fontname=FreeSans, tooltip=" "]');
  });

  test('dollar signs in the title and link prefix are kept literally', () => {
    const dot = renderDot(resolvePlaceholders([]), {
      title: "Costs $& and $' updated Today",
      top: '$$/',
      theme: LIGHT_THEME,
      registry,
      issues: new IssueReport(),
    });
    const lines = dot.split('\n');

    expect(lines[1]).toBe('  graph [rankdir=LR, concentrate=true, URL="$$/index.html"');
    expect(lines[2]).toBe("       label=\"Costs $& and $' updated Today\", fontname=FreeSans, tooltip=\" \"]");
  });
});

describe('renderTypeKey', () => {
  test('draws a single node in the type style', () => {
    const backup = registry.get('backup');
    expect(backup).not.toBeNull();
    if (!backup) return;

    const lines = renderTypeKey(backup, LIGHT_THEME).split('\n');
    expect(lines[2]).toBe('       label="", fontname=FreeSans, tooltip=" "]');
    expect(lines.slice(-2)).toEqual(['bak [shape=component, width=1.5]', '}']);
  });
});
