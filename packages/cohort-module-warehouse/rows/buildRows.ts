import { Context } from '../../cohort-utils/Context';
import { isDefined } from '../../cohort-utils/misc';
import { createLogger } from '../../cohort-log/createLogger';
import { PartialRow } from '../client/WarehouseClient';
import { ParticipantVersion } from '../model/ParticipantVersion';
import { serializeDataGroups, serializeLanguages, serializeStudyMemberships } from './serialize';

export const Columns = {
    healthCode: 'healthCode',
    participantVersion: 'participantVersion',
    createdOn: 'createdOn',
    modifiedOn: 'modifiedOn',
    dataGroups: 'dataGroups',
    languages: 'languages',
    sharingScope: 'sharingScope',
    studyMemberships: 'studyMemberships',
    clientTimeZone: 'clientTimeZone',
    demographicCategoryName: 'demographicCategoryName',
    demographicValue: 'demographicValue',
    demographicUnits: 'demographicUnits'
} as const;

export interface TableColumns {
    tableId: string;
    // column name -> column ID
    ids: ReadonlyMap<string, string>;
}

const log = createLogger('warehouse-rows');

class RowWriter {
    readonly values: { [columnId: string]: string } = {};

    constructor(
        private readonly ctx: Context,
        private readonly columns: TableColumns
    ) {
    }

    set(name: string, value: string) {
        let id = this.columns.ids.get(name);
        if (id === undefined) {
            log.warn(this.ctx, 'Table ' + this.columns.tableId + ' has no column ' + name);
            return;
        }
        this.values[id] = value;
    }

    toRow(): PartialRow {
        return { values: this.values };
    }
}

function ownerOf(pv: ParticipantVersion) {
    return 'healthcode ' + pv.healthCode + ' version ' + pv.participantVersion;
}

/**
 * Row of the participant versions table. Absent fields are left out of the row.
 * With a study ID only that study's membership is written.
 */
export function buildParticipantVersionRow(ctx: Context, studyId: string | null, columns: TableColumns, pv: ParticipantVersion): PartialRow {
    let row = new RowWriter(ctx, columns);
    if (isDefined(pv.healthCode)) {
        row.set(Columns.healthCode, pv.healthCode);
    }
    if (isDefined(pv.participantVersion)) {
        row.set(Columns.participantVersion, String(pv.participantVersion));
    }
    if (isDefined(pv.createdOn)) {
        row.set(Columns.createdOn, String(pv.createdOn.getTime()));
    }
    if (isDefined(pv.modifiedOn)) {
        row.set(Columns.modifiedOn, String(pv.modifiedOn.getTime()));
    }
    if (isDefined(pv.dataGroups)) {
        row.set(Columns.dataGroups, serializeDataGroups(pv.dataGroups));
    }
    if (isDefined(pv.languages)) {
        row.set(Columns.languages, serializeLanguages(ctx, pv.languages, ownerOf(pv)));
    }
    if (isDefined(pv.sharingScope)) {
        row.set(Columns.sharingScope, pv.sharingScope);
    }
    let memberships = serializeStudyMemberships(studyId, pv.studyMemberships);
    if (memberships !== null) {
        row.set(Columns.studyMemberships, memberships);
    }
    if (isDefined(pv.timeZone)) {
        row.set(Columns.clientTimeZone, pv.timeZone);
    }
    return row.toRow();
}

/**
 * One row per demographic value. Empty without health code or version, since such rows
 * can't be joined with the participant versions table.
 */
export function buildDemographicRows(ctx: Context, appId: string, studyId: string | null, columns: TableColumns, pv: ParticipantVersion): PartialRow[] {
    let healthCode = pv.healthCode;
    let version = pv.participantVersion;
    if (!isDefined(healthCode) || !isDefined(version)) {
        return [];
    }

    let rows: PartialRow[] = [];
    for (let [category, demographic] of Object.entries(pv.appDemographics || {})) {
        if (!isDefined(demographic)) {
            continue;
        }
        for (let value of demographic.values) {
            let row = new RowWriter(ctx, columns);
            row.set(Columns.healthCode, healthCode);
            row.set(Columns.participantVersion, String(version));
            row.set(Columns.demographicCategoryName, category);
            row.set(Columns.demographicValue, value);
            if (isDefined(demographic.units)) {
                row.set(Columns.demographicUnits, demographic.units);
            }
            rows.push(row.toRow());
        }
    }
    log.debug(ctx, 'Built ' + rows.length + ' demographic rows for app ' + appId + (studyId ? ' study ' + studyId : ''));
    return rows;
}
