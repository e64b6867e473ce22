import type { PredicateDomain } from '../criteria/types';

export interface CatalogColumn {
    name: string;
    type: string;
    nullable: boolean;
    primaryKey?: boolean;
}

export interface CatalogTable {
    name: string;
    columns: readonly CatalogColumn[];
    rowCount: number;
    description?: string;
}

/** Code reference table used for hierarchy expansion and concept search. */
export interface ReferenceMapping {
    table: string;
    codeColumn: string;
    descriptionColumn?: string;
    groupColumn?: string;
}

export interface DomainMapping {
    table: string;
    /** Falls back to the population subject column. */
    subjectColumn?: string;
    codeColumns: readonly string[];
    dateColumn?: string;
    valueColumn?: string;
    unitColumn?: string;
    ingredientColumn?: string;
    /** Concept keyword to column, e.g. `age -> age` on a demographics table. */
    conceptColumns?: Readonly<Record<string, string>>;
    reference?: ReferenceMapping;
    startColumn?: string;
    endColumn?: string;
}

export type DomainMappings = Readonly<Partial<Record<PredicateDomain, DomainMapping>>>;

export interface PopulationMapping {
    table: string;
    subjectColumn: string;
    /** Enrollment bounds used by `enrollment_start` anchors and the enrollment period. */
    enrollmentStartColumn?: string;
    enrollmentEndColumn?: string;
}

export interface CatalogSchema {
    tables: readonly CatalogTable[];
    domainMappings: DomainMappings;
    population: PopulationMapping;
}

export interface CatalogAdapter {
    getSchema(): Promise<CatalogSchema>;
}
