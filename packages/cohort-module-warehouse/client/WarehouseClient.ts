import * as t from 'io-ts';
import { Context } from '../../cohort-utils/Context';

export const ColumnModelCodec = t.intersection([
    t.type({
        id: t.string,
        name: t.string
    }),
    t.partial({
        columnType: t.union([t.string, t.null])
    })
]);

export type ColumnModel = t.TypeOf<typeof ColumnModelCodec>;

/** Sparse row: only the columns present are written */
export interface PartialRow {
    values: { [columnId: string]: string };
}

export interface WarehouseClient {
    getColumnModels(ctx: Context, tableId: string): Promise<ColumnModel[]>;
    appendRows(ctx: Context, tableId: string, rows: PartialRow[]): Promise<void>;
}
