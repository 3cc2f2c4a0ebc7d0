export * from './analysis/DependentPropagation';
export * from './analysis/DependentTiers';
export * from './config/InventoryConfig';
export * from './governance/AssetRule';
export * from './governance/AssetValidationEngine';
export * from './governance/RuleSet';
export * from './governance/StandardAssetRules';
export * from './graph/DependencyGraph';
export * from './interoperability/SnapshotExport';
export * from './interoperability/yaml/AssetYamlLoader';
export * from './inventory/AnnotatedAsset';
export * from './inventory/Asset';
export * from './inventory/AssetType';
export * from './inventory/AssetTypeRegistry';
export * from './inventory/DependencyExpression';
export * from './pipeline/InventoryPipeline';
export * from './pipeline/loadInventory';
export * from './reliability/DomainError';
export * from './rendering/DotRenderer';
export * from './rendering/DotTheme';
export * from './rendering/InventoryOutputWriter';
export * from './rendering/ValidationReportRenderer';
export * from './validation/IssueReport';
export * from './validation/ValidationIssue';
export * from './views/MissingReferenceResolver';
export * from './views/StandardViews';
export * from './views/SubgraphSelector';
