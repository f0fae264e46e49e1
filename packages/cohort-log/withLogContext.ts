import { Context } from '../cohort-utils/Context';
import { SLogContext, SLogContext2 } from './src/SLogContext';

export function withLogContext(ctx: Context, path: string[]): Context {
    let existing = SLogContext.get(ctx);
    return SLogContext.set(ctx, { path: [...existing.path, ...path], disabled: existing.disabled });
}

export function withLogData(ctx: Context, fields: { [key: string]: unknown }): Context {
    let src = { ...SLogContext2.get(ctx), ...fields };
    return SLogContext2.set(ctx, src);
}

export function withLogDisabled(ctx: Context): Context {
    let existing = SLogContext.get(ctx);
    return SLogContext.set(ctx, { path: existing.path, disabled: true });
}
