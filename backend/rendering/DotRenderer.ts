import { getAssetField, LIST_FIELDS, type Asset } from '../inventory/Asset';
import type { AssetType } from '../inventory/AssetType';
import type { AssetTypeRegistry } from '../inventory/AssetTypeRegistry';
import type { IssueReport } from '../validation/IssueReport';
import type { ResolvedView, ViewNode } from '../views/MissingReferenceResolver';
import type { DotTheme } from './DotTheme';

export type DotRenderContext = {
  title: string;
  /** Prefix for links between generated pages (usually ''). */
  top: string;
  theme: DotTheme;
  registry: AssetTypeRegistry;
  issues: IssueReport;
  /** Scheme of the per-asset edit links, e.g. `asset-edit://<file>#<id>`. */
  editScheme?: string;
};

export const DEFAULT_EDIT_SCHEME = 'asset-edit';

/** Style of nodes whose type is not registered. */
export const UNKNOWN_TYPE_STYLE = 'shape=box';

/** Attribute list entry: `key="value"`, or a raw fragment such as a type's render style. */
type DotAttr = { key: string; value: string } | { raw: string };

export const escapeDot = (text: string): string => text.replace(/\\(?!n)/g, '\\\\').replace(/"/g, '\\"');

const formatAttrs = (attrs: readonly DotAttr[]): string =>
  attrs.map((a) => ('raw' in a ? a.raw : `${a.key}="${escapeDot(a.value)}"`)).join(', ');

/** `<id>.html` with whitespace runs in the id turned into `_`. */
export const htmlFileName = (asset: Pick<Asset, 'id'>): string => `${asset.id.trim().split(/\s+/).join('_')}.html`;

/**
 * Breaks a long label near its middle, at a space, `_` or `-`.
 *
 * Labels of 17 characters or fewer are returned as they are.
 */
export function wrapNodeLabel(text: string): string {
  const half = Math.floor(text.length / 2);
  if (half <= 8) return text;
  const breakable = (ch: string | undefined) => ch === ' ' || ch === '_' || ch === '-';
  for (let i = 0; i < half - 1; i += 1) {
    if (breakable(text[half + i])) return `${text.slice(0, half + i)}\\n${text.slice(half + i)}`;
    if (breakable(text[half - i])) return `${text.slice(0, half - i)}\\n${text.slice(half - i)}`;
  }
  return text;
}

export const editUrl = (asset: Asset, scheme: string = DEFAULT_EDIT_SCHEME): string =>
  `${scheme}://${asset.source.filePath}#${asset.id}`;

/**
 * Hover text: issues first, then text attributes, list attributes and the
 * defining file.
 */
export function assetTooltip(asset: Asset, issues: IssueReport): string[] {
  const lines = issues.issuesFor(asset.id).map((i) => `${i.severity} ${i.message}`);

  for (const key of ['id', 'type', 'name']) {
    const value = getAssetField(asset, key);
    if (typeof value === 'string') lines.push(`${key}: ${value}`);
  }
  for (const [key, value] of asset.fields) {
    if (typeof value === 'string') lines.push(`${key}: ${value}`);
  }

  for (const listField of LIST_FIELDS) {
    const value = getAssetField(asset, listField);
    if (!Array.isArray(value) || value.length === 0) continue;
    lines.push(listField.toUpperCase());
    for (const item of value) lines.push(`  ${item}`);
  }

  lines.push(`Defined in ${asset.source.filePath}`);
  return lines;
}

const header = (theme: DotTheme, top: string, title: string): string[] =>
  theme.header.map((line) => line.replace('{top}', () => top).replace('{title}', () => escapeDot(title)));

const styleFor = (type: AssetType | null): string => type?.renderStyle ?? UNKNOWN_TYPE_STYLE;

/**
 * Graphviz DOT text for a resolved view.
 *
 * - Placeholders: `???` double octagons filled with the theme's error color.
 * - Assets with an ERROR or WARNING are filled with the error color.
 * - Edges run dependency → dependent; the first edge touching an asset
 *   carries its edit link.
 */
export function renderDot(view: ResolvedView, context: DotRenderContext): string {
  const scheme = context.editScheme ?? DEFAULT_EDIT_SCHEME;
  const lines = header(context.theme, context.top, context.title);

  for (const node of view.nodes) {
    if (node.kind !== 'placeholder') continue;
    lines.push(
      `  ${node.nodeId} [label="${escapeDot(node.name)}", shape=doubleoctagon, fillcolor="${context.theme.errorColor}", style=filled]`,
    );
  }

  for (const node of view.nodes) {
    if (node.kind !== 'asset') continue;
    const asset = node.asset;
    const attrs: DotAttr[] = [
      { key: 'label', value: wrapNodeLabel(asset.name) },
      { key: 'URL', value: `${context.top}${htmlFileName(asset)}` },
      { key: 'target', value: `_${asset.id}` },
      { raw: styleFor(context.registry.get(asset.type)) },
    ];
    if (context.issues.hasDefects(asset.id)) {
      attrs.push({ key: 'style', value: 'filled' }, { key: 'fillcolor', value: context.theme.errorColor });
    }
    attrs.push({ key: 'tooltip', value: assetTooltip(asset, context.issues).join('\\n') });
    lines.push(`  ${node.nodeId} [${formatAttrs(attrs)}]`);
  }

  const editLinked = new Set<string>();
  const nodeFor = (id: string): ViewNode | undefined => view.nodeById.get(id);

  for (const edge of view.edges) {
    const dependent = nodeFor(edge.dependentId);
    const dependency = nodeFor(edge.dependencyId);
    if (!dependent || !dependency) continue;

    const attrs: DotAttr[] = [{ key: 'fontcolor', value: context.theme.editColor }];
    if (dependent.kind === 'asset' && !editLinked.has(dependent.id)) {
      editLinked.add(dependent.id);
      attrs.push(
        { key: 'headURL', value: editUrl(dependent.asset, scheme) },
        { key: 'headlabel', value: 'edit' },
        { key: 'headtooltip', value: 'Edit' },
      );
    }
    if (dependency.kind === 'asset' && !editLinked.has(dependency.id)) {
      editLinked.add(dependency.id);
      attrs.push(
        { key: 'tailURL', value: editUrl(dependency.asset, scheme) },
        { key: 'taillabel', value: 'edit' },
        { key: 'tailtooltip', value: 'Edit' },
      );
    }
    lines.push(`  ${edge.fromNodeId} -> ${edge.toNodeId} [${formatAttrs(attrs)}]`);
  }

  lines.push('}');
  return lines.join('\n');
}

/** Legend graph with a single node drawn in the type's style. */
export function renderTypeKey(type: AssetType, theme: DotTheme): string {
  return [...header(theme, '', ''), `${type.idPrefix} [${type.renderStyle}]`, '}'].join('\n');
}
