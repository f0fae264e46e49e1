import winston from 'winston';
import { SLog } from '../SLog';
import { Context, ContextName } from '../../cohort-utils/Context';
import { SLogContext, SLogContext2 } from './SLogContext';

const format = process.env.NODE_ENV === 'production' ?
    winston.format.combine(
        winston.format.json(),
        winston.format.timestamp()
    ) :
    winston.format.combine(
        winston.format.simple(),
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss'
        })
    );

const logger = winston.createLogger({
    level: 'debug',
    format: format,
    transports: [
        new winston.transports.Console(),
    ]
});

function joinMessage(message: unknown, optionalParams: unknown[]) {
    return [message, ...optionalParams].map((v) => v instanceof Error ? (v.stack || v.message) : String(v)).join(' ');
}

export function formatMessage(ctx: Context, name: string, message: unknown, optionalParams: unknown[]) {
    let v = SLogContext.get(ctx);
    return ContextName.get(ctx) + ' | ' + [...v.path, name].join(' ') + ': ' + joinMessage(message, optionalParams);
}

type Level = 'info' | 'debug' | 'warn';

export class SLogImpl implements SLog {
    private readonly name: string;
    private readonly enabled: boolean = true;
    private readonly production = process.env.NODE_ENV === 'production';
    private readonly jest = !!process.env.JEST_WORKER_ID;

    constructor(name: string, enabled: boolean) {
        this.name = name;
        this.enabled = enabled;
    }

    log = (ctx: Context, message?: unknown, ...optionalParams: unknown[]) => {
        this.write('info', ctx, message, optionalParams);
    }

    debug = (ctx: Context, message?: unknown, ...optionalParams: unknown[]) => {
        this.write('debug', ctx, message, optionalParams);
    }

    warn = (ctx: Context, message?: unknown, ...optionalParams: unknown[]) => {
        this.write('warn', ctx, message, optionalParams);
    }

    private write(level: Level, ctx: Context, message: unknown, optionalParams: unknown[]) {
        if (!this.enabled || this.jest) {
            return;
        }
        // Warnings are never muted by the context
        if (level !== 'warn' && SLogContext.get(ctx).disabled) {
            return;
        }
        if (this.production) {
            logger.log(level, {
                app: {
                    ...SLogContext2.get(ctx),
                    context: ContextName.get(ctx),
                    service: this.name,
                    text: joinMessage(message, optionalParams)
                },
                message: formatMessage(ctx, this.name, message, optionalParams)
            });
        } else {
            logger.log(level, formatMessage(ctx, this.name, message, optionalParams));
        }
    }
}
