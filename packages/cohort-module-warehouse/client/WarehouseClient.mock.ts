import { Context } from '../../cohort-utils/Context';
import { ColumnModel, PartialRow, WarehouseClient } from './WarehouseClient';

export class WarehouseClientMock implements WarehouseClient {
    readonly columns = new Map<string, ColumnModel[]>();
    readonly appended: { tableId: string, rows: PartialRow[] }[] = [];
    columnRequests = 0;

    /** Defines a table whose column IDs are the column names prefixed with `id-` */
    defineTable(tableId: string, columnNames: string[]) {
        this.columns.set(tableId, columnNames.map((name) => ({ id: 'id-' + name, name, columnType: 'STRING' })));
        return this;
    }

    async getColumnModels(ctx: Context, tableId: string): Promise<ColumnModel[]> {
        this.columnRequests++;
        let res = this.columns.get(tableId);
        if (!res) {
            throw Error('Unknown table ' + tableId);
        }
        return res.map((c) => ({ ...c }));
    }

    async appendRows(ctx: Context, tableId: string, rows: PartialRow[]) {
        this.appended.push({ tableId, rows });
    }
}
