import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { groupBy } from '../../cohort-utils/groupBy';
import { decodeOrThrow, parseJsonOrThrow } from '../../cohort-errors/decode';
import { createLogger } from '../../cohort-log/createLogger';
import * as t from 'io-ts';
import { DocumentStore } from '../store/DocumentStore';
import {
    FieldDefinitionCodec,
    formatSchemaKey,
    parseSchemaHashKey,
    UploadSchema,
    UploadSchemaIndexItem,
    UploadSchemaItem,
    UploadSchemaKey
} from '../model/UploadSchema';

const ATTR_SCHEMA_KEY = 'schemaKey';
const ATTR_TABLE_ID = 'tableId';
const ATTR_STUDY_ID = 'studyId';

const log = createLogger('schema-tables');

/**
 * Picks the schema with the highest revision. Revisions are unique per schema key.
 */
export function selectCanonicalSchema(schemas: UploadSchema[]): UploadSchema {
    if (schemas.length === 0) {
        throw Error('No schemas to select from');
    }
    return schemas.reduce((canonical, schema) => schema.key.revision > canonical.key.revision ? schema : canonical);
}

function toUploadSchema(item: t.TypeOf<typeof UploadSchemaItem>): UploadSchema {
    let { schemaId } = parseSchemaHashKey(item.key);
    let fieldDefinitions = item.fieldDefinitions
        ? decodeOrThrow(t.array(FieldDefinitionCodec), parseJsonOrThrow(item.fieldDefinitions, 'field definitions'), 'field definitions')
        : [];
    return {
        key: { studyId: item.studyId, schemaId, revision: item.revision },
        name: item.name,
        schemaType: item.schemaType || null,
        fieldDefinitions
    };
}

/**
 * Mapping between upload schemas and the warehouse tables holding their data.
 */
@injectable()
export class SchemaTableRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables
    ) {
        this.store = store;
        this.tables = tables;
    }

    async getTableIdForSchema(ctx: Context, schemaKey: UploadSchemaKey): Promise<string | null> {
        let item = await this.store.getItem(ctx, this.tables.schemaTableMap, { [ATTR_SCHEMA_KEY]: formatSchemaKey(schemaKey) });
        if (!item) {
            return null;
        }
        let tableId = item[ATTR_TABLE_ID];
        return typeof tableId === 'string' ? tableId : null;
    }

    /**
     * Warehouse tables of the study with their canonical schema. Several schemas can share one table;
     * the one with the highest revision wins. Schemas without a table yet are skipped.
     */
    async getTableIdsForStudy(ctx: Context, studyId: string): Promise<Map<string, UploadSchema>> {
        let indexItems = await this.store.query(ctx, this.tables.uploadSchema, {
            index: this.tables.uploadSchemaStudyIndex,
            hashKey: { name: ATTR_STUDY_ID, value: studyId }
        });

        // Index only projects keys, load full records
        let schemas: UploadSchema[] = [];
        for (let indexItem of indexItems) {
            let keys = decodeOrThrow(UploadSchemaIndexItem, indexItem, 'upload schema index entry');
            let item = await this.store.getItem(ctx, this.tables.uploadSchema, { key: keys.key, revision: keys.revision });
            if (!item) {
                log.warn(ctx, 'Schema ' + keys.key + ' revision ' + keys.revision + ' disappeared from the schema table');
                continue;
            }
            schemas.push(toUploadSchema(decodeOrThrow(UploadSchemaItem, item, 'upload schema ' + keys.key)));
        }

        let tableIds = new Map<UploadSchema, string>();
        for (let schema of schemas) {
            let tableId = await this.getTableIdForSchema(ctx, schema.key);
            if (!tableId) {
                // Table not created yet, so there is no data either
                continue;
            }
            tableIds.set(schema, tableId);
        }

        let grouped = groupBy(schemas, (schema) => tableIds.get(schema) || null);
        let res = new Map<string, UploadSchema>();
        for (let [tableId, group] of grouped) {
            res.set(String(tableId), selectCanonicalSchema(group));
        }
        return res;
    }

    async setTableIdMapping(ctx: Context, schemaKey: UploadSchemaKey, tableId: string) {
        await this.store.putItem(ctx, this.tables.schemaTableMap, {
            [ATTR_SCHEMA_KEY]: formatSchemaKey(schemaKey),
            [ATTR_TABLE_ID]: tableId
        });
    }

    async removeTableIdMapping(ctx: Context, schemaKey: UploadSchemaKey) {
        await this.store.deleteItem(ctx, this.tables.schemaTableMap, { [ATTR_SCHEMA_KEY]: formatSchemaKey(schemaKey) });
    }
}
