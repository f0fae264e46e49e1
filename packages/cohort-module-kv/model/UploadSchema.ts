import * as t from 'io-ts';
import { nullable } from './codecs';

export interface UploadSchemaKey {
    studyId: string;
    schemaId: string;
    revision: number;
}

/** Canonical string form, used as the key of the schema to table mapping */
export function formatSchemaKey(key: UploadSchemaKey) {
    return `${key.studyId}-${key.schemaId}-v${key.revision}`;
}

/** Hash key of the upload schema table */
export function schemaHashKey(studyId: string, schemaId: string) {
    return `${studyId}:${schemaId}`;
}

export function parseSchemaHashKey(key: string) {
    let separator = key.indexOf(':');
    if (separator < 0) {
        return { studyId: null, schemaId: key };
    }
    return { studyId: key.substring(0, separator), schemaId: key.substring(separator + 1) };
}

export const FieldDefinitionCodec = t.intersection([
    t.type({
        name: t.string,
        type: t.string
    }),
    t.partial({
        required: t.boolean
    })
]);

export type FieldDefinition = t.TypeOf<typeof FieldDefinitionCodec>;

export interface UploadSchema {
    key: UploadSchemaKey;
    name: string;
    schemaType: string | null;
    fieldDefinitions: FieldDefinition[];
}

// Projection of the study index: only keys
export const UploadSchemaIndexItem = t.type({
    key: t.string,
    revision: t.number
});

export const UploadSchemaItem = t.intersection([
    t.type({
        key: t.string,
        revision: t.number,
        studyId: t.string,
        name: t.string
    }),
    t.partial({
        schemaType: nullable(t.string),
        // JSON-encoded list of field definitions
        fieldDefinitions: nullable(t.string)
    })
]);
