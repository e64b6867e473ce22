import type { PredicateDomain } from '../criteria/types';
import type { CatalogSchema, CatalogTable, DomainMapping } from './types';

export function findTable(schema: CatalogSchema, table: string): CatalogTable | undefined {
    const wanted = table.toLowerCase();
    return schema.tables.find((entry) => entry.name.toLowerCase() === wanted);
}

export function catalogHasTable(schema: CatalogSchema, table: string): boolean {
    return findTable(schema, table) !== undefined;
}

export function catalogHasColumn(schema: CatalogSchema, table: string, column: string): boolean {
    const wanted = column.toLowerCase();
    return findTable(schema, table)?.columns.some((entry) => entry.name.toLowerCase() === wanted) ?? false;
}

/** True when the name appears as a table or as a column of any table. */
export function catalogHasIdentifier(schema: CatalogSchema, name: string): boolean {
    const wanted = name.toLowerCase();
    return schema.tables.some(
        (table) => table.name.toLowerCase() === wanted || table.columns.some((column) => column.name.toLowerCase() === wanted),
    );
}

export function getDomainMapping(schema: CatalogSchema, domain: PredicateDomain): DomainMapping | undefined {
    return schema.domainMappings[domain];
}

export function subjectColumnFor(schema: CatalogSchema, mapping: DomainMapping): string {
    return mapping.subjectColumn ?? schema.population.subjectColumn;
}
