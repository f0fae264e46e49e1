import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
    DeleteCommand,
    DeleteCommandOutput,
    DynamoDBDocumentClient,
    GetCommand,
    GetCommandOutput,
    PutCommand,
    PutCommandOutput,
    QueryCommand,
    QueryCommandInput,
    QueryCommandOutput,
    UpdateCommand,
    UpdateCommandOutput
} from '@aws-sdk/lib-dynamodb';
import { Context } from '../../cohort-utils/Context';
import { createLogger } from '../../cohort-log/createLogger';
import { DuplicateItemError } from '../../cohort-errors/DuplicateItemError';
import { DocumentItem, DocumentKey, DocumentStore, PutOptions, QueryRequest, UpdateRequest } from './DocumentStore';

const log = createLogger('dynamo');

export function buildUpdateExpression(update: UpdateRequest) {
    let names: { [key: string]: string } = {};
    let values: { [key: string]: unknown } = {};
    let clauses: string[] = [];

    let setEntries = Object.entries(update.set || {});
    if (setEntries.length > 0) {
        clauses.push('SET ' + setEntries.map(([name, value], i) => {
            names['#s' + i] = name;
            values[':s' + i] = value;
            return `#s${i} = :s${i}`;
        }).join(', '));
    }
    let removed = update.remove || [];
    if (removed.length > 0) {
        clauses.push('REMOVE ' + removed.map((name, i) => {
            names['#r' + i] = name;
            return '#r' + i;
        }).join(', '));
    }
    if (clauses.length === 0) {
        throw Error('Empty update');
    }

    return {
        UpdateExpression: clauses.join(' '),
        ExpressionAttributeNames: names,
        ExpressionAttributeValues: setEntries.length > 0 ? values : undefined
    };
}

/**
 * The commands the store sends. DynamoDBDocumentClient satisfies it.
 */
export interface DocumentClient {
    send(command: GetCommand): Promise<GetCommandOutput>;
    send(command: PutCommand): Promise<PutCommandOutput>;
    send(command: DeleteCommand): Promise<DeleteCommandOutput>;
    send(command: UpdateCommand): Promise<UpdateCommandOutput>;
    send(command: QueryCommand): Promise<QueryCommandOutput>;
}

export class DynamoDocumentStore implements DocumentStore {
    readonly client: DocumentClient;

    constructor(client: DocumentClient) {
        this.client = client;
    }

    async getItem(ctx: Context, table: string, key: DocumentKey): Promise<DocumentItem | null> {
        let res = await this.client.send(new GetCommand({ TableName: table, Key: key }));
        return res.Item || null;
    }

    async putItem(ctx: Context, table: string, item: DocumentItem, opts?: PutOptions) {
        try {
            await this.client.send(new PutCommand({
                TableName: table,
                Item: item,
                ...(opts && opts.ifNotExists ? {
                    ConditionExpression: 'attribute_not_exists(#k)',
                    ExpressionAttributeNames: { '#k': opts.ifNotExists }
                } : {})
            }));
        } catch (e) {
            if (e instanceof ConditionalCheckFailedException) {
                throw new DuplicateItemError(table);
            }
            throw e;
        }
    }

    async deleteItem(ctx: Context, table: string, key: DocumentKey) {
        await this.client.send(new DeleteCommand({ TableName: table, Key: key }));
    }

    async updateItem(ctx: Context, table: string, key: DocumentKey, update: UpdateRequest) {
        await this.client.send(new UpdateCommand({ TableName: table, Key: key, ...buildUpdateExpression(update) }));
    }

    async query(ctx: Context, table: string, query: QueryRequest): Promise<DocumentItem[]> {
        log.debug(ctx, 'Querying', table, query.index || '', query.hashKey.name);
        let items: DocumentItem[] = [];
        let exclusiveStartKey: QueryCommandInput['ExclusiveStartKey'] = undefined;
        while (true) {
            let res: QueryCommandOutput = await this.client.send(new QueryCommand({
                TableName: table,
                IndexName: query.index,
                KeyConditionExpression: '#h = :h',
                ExpressionAttributeNames: { '#h': query.hashKey.name },
                ExpressionAttributeValues: { ':h': query.hashKey.value },
                ScanIndexForward: !query.descending,
                Limit: query.limit !== undefined ? query.limit - items.length : undefined,
                ExclusiveStartKey: exclusiveStartKey
            }));
            items.push(...(res.Items || []));
            if (query.limit !== undefined && items.length >= query.limit) {
                return items.slice(0, query.limit);
            }
            if (!res.LastEvaluatedKey) {
                return items;
            }
            exclusiveStartKey = res.LastEvaluatedKey;
        }
    }
}

export function createDynamoDocumentStore(opts: { region: string, endpoint?: string | null }) {
    let client = new DynamoDBClient({ region: opts.region, endpoint: opts.endpoint || undefined });
    return new DynamoDocumentStore(DynamoDBDocumentClient.from(client, {
        marshallOptions: { removeUndefinedValues: true }
    }));
}
