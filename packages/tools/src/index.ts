export {
  ToolCatalog,
  BUILTIN_CATALOG_DIR,
  loadCatalog,
  loadCatalogFile,
  loadCatalogDirectory,
  type LoadCatalogOptions,
} from './catalog.js';
export {
  createFixtureSearch,
  loadFixtureRecords,
  type SearchCriteria,
  type SearchSource,
} from './fixture-search.js';
export * from './mcp/index.js';
