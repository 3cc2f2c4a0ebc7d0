import { loadAssetFiles } from '../interoperability/yaml/AssetYamlLoader';
import { loadAssetTypeRegistry } from '../inventory/AssetTypeRegistry';
import { DomainError } from '../reliability/DomainError';
import { runInventoryPipeline, type InventorySnapshot } from './InventoryPipeline';

export type LoadInventoryArgs = {
  assetFiles: readonly string[];
  typesFile?: string | null;
  updated?: string;
  maxTraversalSteps?: number;
};

/** Reads the type registry and asset files from disk, then runs the pipeline. */
export function loadInventory(args: LoadInventoryArgs): InventorySnapshot {
  if (args.assetFiles.length === 0) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: 'No asset files given.',
    });
  }

  const registry = loadAssetTypeRegistry(args.typesFile);
  const documents = loadAssetFiles(args.assetFiles);

  return runInventoryPipeline({
    documents,
    registry,
    updated: args.updated,
    limits: { maxTraversalSteps: args.maxTraversalSteps },
  });
}
