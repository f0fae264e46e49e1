import { inject, injectable } from 'inversify';
import { Context } from '../cohort-utils/Context';
import { isDefined } from '../cohort-utils/misc';
import { createLogger } from '../cohort-log/createLogger';
import { withLogContext, withLogData } from '../cohort-log/withLogContext';
import { WarehouseClient } from './client/WarehouseClient';
import { ColumnIdResolver } from './ColumnIdResolver';
import { ParticipantVersion } from './model/ParticipantVersion';
import { buildDemographicRows, buildParticipantVersionRow } from './rows/buildRows';

export interface ParticipantVersionTables {
    participantVersionTableId: string;
    demographicsTableId?: string | null;
}

const log = createLogger('warehouse');

@injectable()
export class WarehouseModule {
    @inject('ColumnIdResolver')
    private readonly columns!: ColumnIdResolver;

    @inject('WarehouseClient')
    private readonly client!: WarehouseClient;

    start = async () => {
        // Nothing to do
    }

    resolveColumnIds(ctx: Context, tableId: string) {
        return this.columns.resolveColumnIds(ctx, tableId);
    }

    async buildParticipantVersionRow(ctx: Context, studyId: string | null, tableId: string, pv: ParticipantVersion) {
        let ids = await this.columns.resolveColumnIds(ctx, tableId);
        return buildParticipantVersionRow(ctx, studyId, { tableId, ids }, pv);
    }

    async buildDemographicRows(ctx: Context, appId: string, studyId: string | null, tableId: string, pv: ParticipantVersion) {
        let ids = await this.columns.resolveColumnIds(ctx, tableId);
        return buildDemographicRows(ctx, appId, studyId, { tableId, ids }, pv);
    }

    /**
     * Appends the participant version row and, when a demographics table is given, its demographic rows.
     */
    async exportParticipantVersion(parent: Context, appId: string, studyId: string | null, tables: ParticipantVersionTables, pv: ParticipantVersion) {
        let ctx = withLogData(withLogContext(parent, ['export']), { appId, studyId });
        let row = await this.buildParticipantVersionRow(ctx, studyId, tables.participantVersionTableId, pv);
        await this.client.appendRows(ctx, tables.participantVersionTableId, [row]);

        let demographicsTableId = tables.demographicsTableId;
        if (isDefined(demographicsTableId)) {
            let rows = await this.buildDemographicRows(ctx, appId, studyId, demographicsTableId, pv);
            if (rows.length > 0) {
                await this.client.appendRows(ctx, demographicsTableId, rows);
            }
        }
        log.log(ctx, 'Exported participant version ' + pv.participantVersion + ' of app ' + appId);
    }
}
