export { catalogHasColumn, catalogHasIdentifier, catalogHasTable, findTable, getDomainMapping, subjectColumnFor } from './catalogLookup';
export { DEFAULT_DOMAIN_MAPPINGS, DEFAULT_POPULATION, TABLE_DESCRIPTIONS } from './defaultMappings';
export { SqliteCatalogAdapter } from './sqliteCatalog';
export type { SqliteCatalogAdapterOptions } from './sqliteCatalog';
export type {
    CatalogAdapter,
    CatalogColumn,
    CatalogSchema,
    CatalogTable,
    DomainMapping,
    DomainMappings,
    PopulationMapping,
    ReferenceMapping,
} from './types';
