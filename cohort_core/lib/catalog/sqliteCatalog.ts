import { PREDICATE_DOMAINS } from '../criteria/types';
import type { PredicateDomain } from '../criteria/types';
import { readCount } from '../store/rows';
import type { CohortStore } from '../store/types';
import { DEFAULT_DOMAIN_MAPPINGS, DEFAULT_POPULATION, TABLE_DESCRIPTIONS } from './defaultMappings';
import type { CatalogAdapter, CatalogColumn, CatalogSchema, CatalogTable, DomainMapping, DomainMappings, PopulationMapping } from './types';

const SAFE_TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SqliteCatalogAdapterOptions {
    store: CohortStore;
    domainMappings?: DomainMappings;
    population?: PopulationMapping;
    descriptions?: Readonly<Record<string, string>>;
}

/**
 * Introspects a SQLite store on every call. Domain mappings whose table is absent
 * from the database are left out of the returned schema.
 */
export class SqliteCatalogAdapter implements CatalogAdapter {
    private readonly store: CohortStore;
    private readonly domainMappings: DomainMappings;
    private readonly population: PopulationMapping;
    private readonly descriptions: Readonly<Record<string, string>>;

    constructor(options: SqliteCatalogAdapterOptions) {
        this.store = options.store;
        this.domainMappings = options.domainMappings ?? DEFAULT_DOMAIN_MAPPINGS;
        this.population = options.population ?? DEFAULT_POPULATION;
        this.descriptions = options.descriptions ?? TABLE_DESCRIPTIONS;
    }

    async getSchema(): Promise<CatalogSchema> {
        const tableRows = await this.store.query(
            "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        );

        const names = tableRows
            .map((row) => normalizeString(row.name))
            .filter((name): name is string => name !== null && SAFE_TABLE_NAME.test(name));

        const tables: CatalogTable[] = [];
        for (const name of names) {
            tables.push(await this.describeTable(name));
        }

        const present = new Set(tables.map((table) => table.name.toLowerCase()));
        const domainMappings: Partial<Record<PredicateDomain, DomainMapping>> = {};
        for (const domain of PREDICATE_DOMAINS) {
            const mapping = this.domainMappings[domain];
            if (mapping && present.has(mapping.table.toLowerCase())) {
                domainMappings[domain] = mapping;
            }
        }

        return {
            tables,
            domainMappings,
            population: this.population,
        };
    }

    private async describeTable(name: string): Promise<CatalogTable> {
        const columnRows = await this.store.query(`PRAGMA table_info(${name})`);
        const columns: CatalogColumn[] = columnRows.map((row) => ({
            name: normalizeString(row.name) ?? '',
            type: normalizeString(row.type) ?? '',
            nullable: !toBoolean(row.notnull),
            primaryKey: toBoolean(row.pk),
        })).filter((column) => column.name.length > 0);

        const countRows = await this.store.query(`SELECT COUNT(*) AS n FROM ${name}`);
        const rowCount = readCount(countRows[0]);

        const description = this.descriptions[name];
        return description === undefined ? { name, columns, rowCount } : { name, columns, rowCount, description };
    }
}

function normalizeString(value: unknown): string | null {
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function toBoolean(value: unknown): boolean {
    return value === 1 || value === true || value === 1n;
}
