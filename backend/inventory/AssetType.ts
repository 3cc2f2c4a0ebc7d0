export type AssetTypeTag = 'top' | 'bottom';

/**
 * AssetType (registry entry).
 *
 * - `requiredDependencyPatterns` are regular expressions searched against the
 *   type of each candidate dependency.
 * - `renderStyle` is a Graphviz attribute fragment, e.g. `shape=box, width=1`.
 */
export type AssetType = {
  readonly description: string;
  readonly renderStyle: string;
  readonly color: string;
  readonly tags: ReadonlySet<AssetTypeTag>;
  readonly requiredFields: readonly string[];
  readonly requiredDependencyPatterns: readonly string[];
  readonly idPrefix: string;
};

/** Shape of one entry in a type registry JSON file. */
export type AssetTypeDefinition = {
  description: string;
  renderStyle: string;
  color?: string;
  tags?: readonly string[];
  requiredFields?: readonly string[];
  requiredDependencyPatterns?: readonly string[];
  idPrefix: string;
};

export const isAssetTypeTag = (value: unknown): value is AssetTypeTag =>
  value === 'top' || value === 'bottom';
