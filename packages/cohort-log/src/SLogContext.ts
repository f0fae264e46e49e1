import { createContextNamespace } from '../../cohort-utils/Context';

export const SLogContext = createContextNamespace<{ path: string[], disabled: boolean }>('log', { path: [], disabled: false });
export const SLogContext2 = createContextNamespace<{ [key: string]: unknown }>('log-data', {});
