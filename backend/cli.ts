#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';

import { loadInventoryConfig, type InventoryConfig } from './config/InventoryConfig';
import { loadInventory } from './pipeline/loadInventory';
import type { InventorySnapshot } from './pipeline/InventoryPipeline';
import { asDomainError, DomainError } from './reliability/DomainError';
import { writeInventoryOutputs } from './rendering/InventoryOutputWriter';
import { isDotThemeName, themeByName, type DotThemeName } from './rendering/DotTheme';
import { renderIssueCounts, renderValidationReport } from './rendering/ValidationReportRenderer';

type CommonOptions = {
  assets?: string[];
  types?: string;
  updated?: string;
};

type GenerateOptions = CommonOptions & {
  output?: string;
  theme?: string;
  leafType?: string;
  leafNegate?: boolean;
};

const fail = (err: unknown) => {
  const domain = asDomainError(err);
  // eslint-disable-next-line no-console
  console.error(`[cli] ${domain.code}: ${domain.message}`);
  process.exitCode = 1;
};

const loadFrom = (config: InventoryConfig, opts: CommonOptions): InventorySnapshot =>
  loadInventory({
    assetFiles: opts.assets && opts.assets.length > 0 ? opts.assets : config.assetFiles,
    typesFile: opts.types ?? config.typesFile,
    updated: opts.updated,
    maxTraversalSteps: config.maxTraversalSteps,
  });

const resolveTheme = (value: string | undefined, fallback: DotThemeName): DotThemeName => {
  if (value === undefined) return fallback;
  if (!isDotThemeName(value)) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: `Unknown theme "${value}"; use light or dark.`,
      details: { theme: value },
    });
  }
  return value;
};

export function runGenerate(opts: GenerateOptions, env: Record<string, string | undefined> = process.env): void {
  const config = loadInventoryConfig(env);
  const snapshot = loadFrom(config, opts);
  const summary = writeInventoryOutputs(snapshot, {
    outputDir: opts.output ?? config.outputDir,
    theme: themeByName(resolveTheme(opts.theme, config.theme)),
    leafType: opts.leafType,
    leafNegate: opts.leafNegate,
    maxFixpointPasses: config.maxFixpointPasses,
  });

  // eslint-disable-next-line no-console
  console.log(`[cli] ${snapshot.title}`);
  // eslint-disable-next-line no-console
  console.log(`[cli] ${summary.views.length} views, ${summary.files.length} files written to ${summary.outputDir}`);
  // eslint-disable-next-line no-console
  console.log(`[cli] ${renderIssueCounts(snapshot.issues)}`);
}

/** Prints the report; returns false when any ERROR issue exists. */
export function runValidate(opts: CommonOptions, env: Record<string, string | undefined> = process.env): boolean {
  const config = loadInventoryConfig(env);
  const snapshot = loadFrom(config, opts);
  const report = renderValidationReport(snapshot.assets, snapshot.issues);

  // eslint-disable-next-line no-console
  console.log(report || 'No issues');
  // eslint-disable-next-line no-console
  console.log(`[cli] ${renderIssueCounts(snapshot.issues)}`);
  return !snapshot.issues.hasErrors();
}

export const createProgram = (): Command => {
  const program = new Command();

  program.name('inventory-map').description('Validate IT asset inventories and draw dependency maps').version('0.1.0');

  program
    .command('generate')
    .description('Validate the inventory and write DOT maps, the report and a JSON export')
    .option('--assets <files...>', 'Asset YAML files (default: INVENTORY_ASSETS)')
    .option('--output <dir>', 'Output directory (default: INVENTORY_OUTPUT_DIR or asset_inventory)')
    .option('--theme <name>', 'light or dark')
    .option('--leaf-type <pattern>', 'Only map assets leading to a type matching this pattern')
    .option('--leaf-negate', 'With --leaf-type, map the assets NOT leading to it')
    .option('--updated <when>', 'Stamp shown in the title (default: now)')
    .option('--types <file>', 'Asset type registry JSON')
    .action((opts: GenerateOptions) => {
      try {
        runGenerate(opts);
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('validate')
    .description('Print the validation report; exits 1 when any ERROR is found')
    .option('--assets <files...>', 'Asset YAML files (default: INVENTORY_ASSETS)')
    .option('--types <file>', 'Asset type registry JSON')
    .option('--updated <when>', 'Stamp shown in the title (default: now)')
    .action((opts: CommonOptions) => {
      try {
        if (!runValidate(opts)) process.exitCode = 1;
      } catch (err) {
        fail(err);
      }
    });

  return program;
};

if (require.main === module) {
  createProgram().parse(process.argv);
}
