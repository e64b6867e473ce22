import type { CatalogAdapter, CatalogSchema } from '../catalog/types';

/**
 * Serves fixed schemas in order; the last one repeats once the list runs out.
 * `calls` counts how often the schema was fetched.
 */
export class StaticCatalogAdapter implements CatalogAdapter {
    private readonly schemas: readonly CatalogSchema[];
    calls = 0;

    constructor(...schemas: [CatalogSchema, ...CatalogSchema[]]) {
        this.schemas = schemas;
    }

    async getSchema(): Promise<CatalogSchema> {
        const schema = this.schemas[Math.min(this.calls, this.schemas.length - 1)];
        this.calls += 1;
        return schema;
    }
}
