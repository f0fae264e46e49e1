import * as t from 'io-ts';
import fetch, { RequestInit, Response } from 'node-fetch';
import { Context } from '../../cohort-utils/Context';
import { retry, RetryOptions } from '../../cohort-utils/timer';
import { createLogger } from '../../cohort-log/createLogger';
import { WarehouseError } from '../../cohort-errors/WarehouseError';
import { decodeOrThrow, parseJsonOrThrow } from '../../cohort-errors/decode';
import { ColumnModel, ColumnModelCodec, PartialRow, WarehouseClient } from './WarehouseClient';

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export interface RestWarehouseClientOptions {
    endpoint: string;
    accessToken: string;
    retry?: Partial<RetryOptions>;
    fetcher?: Fetcher;
}

const ColumnListCodec = t.type({
    results: t.array(ColumnModelCodec)
});

const log = createLogger('warehouse');

function isRetryable(e: unknown) {
    if (e instanceof WarehouseError) {
        return e.retryable;
    }
    // Network failures
    return true;
}

// Appends are not idempotent: only throttling is rejected before anything is written
function isThrottled(e: unknown) {
    return e instanceof WarehouseError && e.status === 429;
}

/**
 * Client of the warehouse table REST API. Reads are retried with exponential backoff
 * on network errors, throttling and server errors; appends only on throttling.
 */
export class RestWarehouseClient implements WarehouseClient {
    private readonly endpoint: string;
    private readonly accessToken: string;
    private readonly retryOptions: Partial<RetryOptions>;
    private readonly fetcher: Fetcher;

    constructor(opts: RestWarehouseClientOptions) {
        this.endpoint = opts.endpoint.replace(/\/+$/, '');
        this.accessToken = opts.accessToken;
        this.retryOptions = opts.retry || {};
        this.fetcher = opts.fetcher || fetch;
    }

    async getColumnModels(ctx: Context, tableId: string): Promise<ColumnModel[]> {
        let body = await this.request(ctx, 'GET', `/entity/${encodeURIComponent(tableId)}/column`, undefined, isRetryable);
        return decodeOrThrow(ColumnListCodec, parseJsonOrThrow(body, 'column list'), 'column list of ' + tableId).results;
    }

    async appendRows(ctx: Context, tableId: string, rows: PartialRow[]) {
        if (rows.length === 0) {
            return;
        }
        await this.request(ctx, 'POST', `/entity/${encodeURIComponent(tableId)}/table/rows`, { tableId, rows }, isThrottled);
    }

    private async request(ctx: Context, method: 'GET' | 'POST', path: string, body: object | undefined, shouldRetry: (e: unknown) => boolean): Promise<string> {
        let url = this.endpoint + path;
        let attempt = 0;
        return retry(async () => {
            attempt++;
            if (attempt > 1) {
                log.log(ctx, method + ' ' + path + ' attempt #' + attempt);
            }
            let res = await this.fetcher(url, {
                method,
                headers: {
                    authorization: 'Bearer ' + this.accessToken,
                    'content-type': 'application/json'
                },
                body: body !== undefined ? JSON.stringify(body) : undefined
            });
            let text = await res.text();
            if (!res.ok) {
                throw new WarehouseError(method + ' ' + path + ' failed with status ' + res.status + ': ' + text, res.status);
            }
            return text;
        }, { ...this.retryOptions, shouldRetry });
    }
}
