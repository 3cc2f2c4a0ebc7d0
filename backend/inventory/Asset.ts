export type AssetFieldValue = string | readonly string[];

/** Where a record came from; used in duplicate reports, tooltips and edit links. */
export type AssetSource = {
  /** Absolute path of the asset file, or a caller-chosen label for in-memory records. */
  filePath: string;
  /** Position of the record inside its file. */
  index: number;
  /** `general.title` of the file, when present. */
  title?: string;
};

/**
 * Asset (inventory record).
 *
 * Typed core plus a `fields` map holding every other string or string-list
 * attribute (location, owner, open_issues, notes, links, ...).
 */
export type Asset = {
  readonly id: string;
  readonly type?: string;
  readonly name: string;
  readonly dependsOn: readonly string[];
  readonly tags: readonly string[];
  readonly fields: ReadonlyMap<string, AssetFieldValue>;
  readonly source: AssetSource;
};

/** Fields rendered as lists on reports and tooltips. */
export const LIST_FIELDS = ['closed_issues', 'depends_on', 'links', 'notes', 'open_issues', 'tags'] as const;

export const ARCHIVED_TAG = 'archived';
/** Stand-in for the type of a record that declares none. */
export const MISSING_TYPE = 'NOT-SPECIFIED';
export const NEEDS_WORK_TAG = 'needs_work';

/** Looks a field up by its record name, covering the typed core as well. */
export const getAssetField = (asset: Asset, field: string): AssetFieldValue | undefined => {
  switch (field) {
    case 'id':
      return asset.id;
    case 'type':
      return asset.type;
    case 'name':
      return asset.name;
    case 'depends_on':
      return asset.dependsOn;
    case 'tags':
      return asset.tags;
    default:
      return asset.fields.get(field);
  }
};

/** Present and non-empty: a string or list with at least one character or entry. */
export const hasAssetField = (asset: Asset, field: string): boolean => {
  const value = getAssetField(asset, field);
  if (value === undefined) return false;
  return value.length > 0;
};

export const hasTag = (asset: Asset, tag: string): boolean => asset.tags.includes(tag);

export const isArchived = (asset: Asset): boolean => hasTag(asset, ARCHIVED_TAG);

export const typeLabelOf = (asset: Asset): string => asset.type ?? MISSING_TYPE;

/** Text before the first `_` of the id, e.g. `srv` for `srv_web01`. */
export const idPrefixOf = (id: string): string => id.split('_')[0] ?? '';

type AssetInit = {
  id: string;
  type?: string;
  name?: string;
  dependsOn?: readonly string[];
  tags?: readonly string[];
  fields?: Record<string, AssetFieldValue>;
  source?: AssetSource;
};

/** Builds an Asset from plain values; in-memory records default to an `<inline>` source. */
export const createAsset = (init: AssetInit): Asset => ({
  id: init.id,
  type: init.type,
  name: init.name ?? init.id,
  dependsOn: Object.freeze([...(init.dependsOn ?? [])]),
  tags: Object.freeze([...(init.tags ?? [])]),
  fields: new Map(Object.entries(init.fields ?? {})),
  source: init.source ?? { filePath: '<inline>', index: 0 },
});
