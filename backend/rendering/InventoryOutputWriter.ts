import fs from 'node:fs';
import path from 'node:path';

import { exportSnapshot } from '../interoperability/SnapshotExport';
import type { AnnotatedAsset } from '../inventory/AnnotatedAsset';
import type { InventorySnapshot } from '../pipeline/InventoryPipeline';
import { telemetry } from '../telemetry/Telemetry';
import { resolveInventoryView, standardViews } from '../views/StandardViews';
import { trimToLeafType } from '../views/SubgraphSelector';
import { renderDot, renderTypeKey } from './DotRenderer';
import type { DotTheme } from './DotTheme';
import { renderIssueCounts, renderValidationReport } from './ValidationReportRenderer';

export type OutputOptions = {
  outputDir: string;
  theme: DotTheme;
  /** Trim every map to assets leading to this type (searched, unanchored). */
  leafType?: string;
  /** With `leafType`: keep the assets NOT leading to it instead. */
  leafNegate?: boolean;
  maxFixpointPasses?: number;
};

export type WrittenView = {
  name: string;
  file: string;
  selected: number;
  placeholders: number;
};

export type OutputSummary = {
  outputDir: string;
  files: string[];
  views: WrittenView[];
  /** Assets considered for the maps after leaf trimming. */
  mappedAssets: number;
};

/** Assets the maps are drawn from, after optional leaf-type trimming. */
export const mapAssets = (snapshot: InventorySnapshot, options: Pick<OutputOptions, 'leafType' | 'leafNegate'>) =>
  options.leafType
    ? trimToLeafType<AnnotatedAsset>(snapshot.assets, options.leafType, Boolean(options.leafNegate))
    : [...snapshot.assets];

/**
 * Writes one run's outputs:
 * - `<view>.dot` for every standard view;
 * - `__<type>.dot` legend per registered type;
 * - `validation.txt` and `inventory.json`.
 *
 * Running Graphviz on the .dot files is left to the caller.
 */
export function writeInventoryOutputs(snapshot: InventorySnapshot, options: OutputOptions): OutputSummary {
  const startedAtMs = telemetry.nowMs();
  fs.mkdirSync(options.outputDir, { recursive: true });

  const files: string[] = [];
  const write = (name: string, content: string) => {
    const file = path.join(options.outputDir, name);
    fs.writeFileSync(file, content, 'utf8');
    files.push(file);
    return file;
  };

  const assets = mapAssets(snapshot, options);
  const context = {
    title: snapshot.title,
    top: '',
    theme: options.theme,
    registry: snapshot.registry,
    issues: snapshot.issues,
  };

  const views: WrittenView[] = [];
  for (const view of standardViews(snapshot.registry, assets, { maxFixpointPasses: options.maxFixpointPasses })) {
    const { selected, resolved } = resolveInventoryView(view, assets);
    const file = write(`${view.name}.dot`, `${renderDot(resolved, context)}\n`);
    views.push({ name: view.name, file, selected: selected.length, placeholders: resolved.placeholderIds.length });
  }

  for (const [typeName, type] of snapshot.registry.entries()) {
    write(`__${typeName.replace(/\//g, '-')}.dot`, `${renderTypeKey(type, options.theme)}\n`);
  }

  const report = renderValidationReport(snapshot.assets, snapshot.issues);
  write('validation.txt', `${snapshot.title}\n${renderIssueCounts(snapshot.issues)}\n\n${report}\n`);
  write('inventory.json', `${JSON.stringify(exportSnapshot(snapshot), null, 2)}\n`);

  telemetry.record({
    name: 'inventory.write',
    durationMs: telemetry.nowMs() - startedAtMs,
    tags: { theme: options.theme.name, leafType: options.leafType ?? null },
    metrics: { fileCount: files.length, viewCount: views.length, mappedAssets: assets.length },
  });

  return { outputDir: options.outputDir, files, views, mappedAssets: assets.length };
}
