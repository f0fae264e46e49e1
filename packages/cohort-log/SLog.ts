import { Context } from '../cohort-utils/Context';

export interface SLog {
    log: (ctx: Context, message?: unknown, ...optionalParams: unknown[]) => void;
    debug: (ctx: Context, message?: unknown, ...optionalParams: unknown[]) => void;
    warn: (ctx: Context, message?: unknown, ...optionalParams: unknown[]) => void;
}
