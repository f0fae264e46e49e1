import * as t from 'io-ts';
import fs from 'fs';
import { isRight } from 'fp-ts/lib/Either';
import { PathReporter } from 'io-ts/lib/PathReporter';

const retryCodec = t.type({
    maxFailureCount: t.number,
    minDelay: t.number,
    maxDelay: t.number
});

const codec = t.type({
    app: t.type({
        environment: t.union([t.literal('production'), t.literal('staging'), t.literal('debug'), t.literal('test')])
    }),
    store: t.type({
        region: t.string,
        endpoint: t.union([t.string, t.null, t.undefined]),
        tables: t.type({
            notificationConfig: t.string,
            notificationLog: t.string,
            study: t.string,
            schemaTableMap: t.string,
            metaTable: t.string,
            surveyTables: t.string,
            uploadSchema: t.string,
            uploadSchemaStudyIndex: t.string,
            workerLog: t.string
        })
    }),
    warehouse: t.type({
        endpoint: t.string,
        accessToken: t.string,
        retry: t.union([retryCodec, t.null, t.undefined])
    })
});

export type Configuration = t.TypeOf<typeof codec>;
export type StoreTables = Configuration['store']['tables'];

let configuration: Configuration | undefined = undefined;

export function loadConfig(configPath: string): Configuration {
    let res = fs.readFileSync(configPath, { encoding: 'utf8' });
    let parsed: unknown = JSON.parse(res);
    let decoded = codec.decode(parsed);
    if (isRight(decoded)) {
        return decoded.right;
    } else {
        throw Error('Error in config: ' + JSON.stringify(PathReporter.report(decoded)));
    }
}

function loadConfigIfNeeded(): Configuration {
    if (configuration) {
        return configuration;
    }
    let configPath = process.env.COHORT_CONFIG;
    if (!configPath) {
        throw Error('Config path not provided');
    }
    configuration = loadConfig(configPath);
    return configuration;
}

class ConfigProvider {
    constructor() {
        Object.freeze(this);
    }

    get environment() {
        return loadConfigIfNeeded().app.environment;
    }

    get store() {
        return loadConfigIfNeeded().store;
    }

    get warehouse() {
        return loadConfigIfNeeded().warehouse;
    }

    reset() {
        configuration = undefined;
    }
}

export const Config = new ConfigProvider();
