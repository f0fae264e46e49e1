import { createNamedContext } from '../../cohort-utils/Context';
import { decodeParticipantVersion } from '../model/ParticipantVersion';
import { buildDemographicRows, buildParticipantVersionRow, Columns, TableColumns } from './buildRows';

function tableColumns(names: string[]): TableColumns {
    return { tableId: 'table-1', ids: new Map(names.map((name) => [name, 'c-' + name])) };
}

const versionColumns = tableColumns([
    Columns.healthCode,
    Columns.participantVersion,
    Columns.createdOn,
    Columns.modifiedOn,
    Columns.dataGroups,
    Columns.languages,
    Columns.sharingScope,
    Columns.studyMemberships,
    Columns.clientTimeZone
]);

const demographicColumns = tableColumns([
    Columns.healthCode,
    Columns.participantVersion,
    Columns.demographicCategoryName,
    Columns.demographicValue,
    Columns.demographicUnits
]);

describe('buildParticipantVersionRow', () => {
    const ctx = createNamedContext('test');

    it('should build full row', () => {
        let pv = decodeParticipantVersion({
            healthCode: 'hc-1',
            participantVersion: 3,
            createdOn: '2023-01-02T03:04:05.000Z',
            modifiedOn: '2023-01-03T00:00:00.000Z',
            dataGroups: ['group-z', 'group-a'],
            languages: ['en'],
            sharingScope: 'all_qualified_researchers',
            studyMemberships: { study2: 'ext-2', study1: '<none>' },
            timeZone: 'America/Los_Angeles'
        });
        expect(buildParticipantVersionRow(ctx, null, versionColumns, pv)).toEqual({
            values: {
                'c-healthCode': 'hc-1',
                'c-participantVersion': '3',
                'c-createdOn': String(Date.UTC(2023, 0, 2, 3, 4, 5)),
                'c-modifiedOn': String(Date.UTC(2023, 0, 3)),
                'c-dataGroups': 'group-a,group-z',
                'c-languages': '["en"]',
                'c-sharingScope': 'all_qualified_researchers',
                'c-studyMemberships': '|study1=|study2=ext-2|',
                'c-clientTimeZone': 'America/Los_Angeles'
            }
        });
    });

    it('should omit absent fields', () => {
        let pv = decodeParticipantVersion({ healthCode: 'hc-1', dataGroups: null, studyMemberships: {} });
        expect(buildParticipantVersionRow(ctx, null, versionColumns, pv)).toEqual({
            values: { 'c-healthCode': 'hc-1' }
        });
    });

    it('should write empty data groups', () => {
        let pv = decodeParticipantVersion({ dataGroups: [] });
        expect(buildParticipantVersionRow(ctx, null, versionColumns, pv)).toEqual({
            values: { 'c-dataGroups': '' }
        });
    });

    it('should filter memberships by study', () => {
        let pv = decodeParticipantVersion({ studyMemberships: { study1: 'ext-1', study2: 'ext-2' } });
        expect(buildParticipantVersionRow(ctx, 'study2', versionColumns, pv).values).toEqual({
            'c-studyMemberships': '|study2=ext-2|'
        });
        expect(buildParticipantVersionRow(ctx, 'study3', versionColumns, pv).values).toEqual({});
    });

    it('should skip columns the table does not define', () => {
        let pv = decodeParticipantVersion({ healthCode: 'hc-1', timeZone: 'UTC' });
        let row = buildParticipantVersionRow(ctx, null, tableColumns([Columns.healthCode]), pv);
        expect(row).toEqual({ values: { 'c-healthCode': 'hc-1' } });
    });

    it('should reject malformed participant version', () => {
        expect(() => decodeParticipantVersion({ createdOn: 'yesterday' })).toThrow('Invalid participant version');
        expect(() => decodeParticipantVersion({ participantVersion: 1.5 })).toThrow('Invalid participant version');
    });
});

describe('buildDemographicRows', () => {
    const ctx = createNamedContext('test');
    const demographics = {
        height: { units: 'cm', values: ['170'] },
        ethnicity: { values: ['a', 'b'] },
        skipped: null
    };

    it('should return nothing without health code', () => {
        let pv = decodeParticipantVersion({ participantVersion: 1, appDemographics: demographics });
        expect(buildDemographicRows(ctx, 'app-1', null, demographicColumns, pv)).toEqual([]);
    });

    it('should return nothing without version', () => {
        let pv = decodeParticipantVersion({ healthCode: 'hc-1', appDemographics: demographics });
        expect(buildDemographicRows(ctx, 'app-1', null, demographicColumns, pv)).toEqual([]);
    });

    it('should emit one row per value', () => {
        let pv = decodeParticipantVersion({ healthCode: 'hc-1', participantVersion: 2, appDemographics: demographics });
        expect(buildDemographicRows(ctx, 'app-1', 'study-1', demographicColumns, pv)).toEqual([
            {
                values: {
                    'c-healthCode': 'hc-1',
                    'c-participantVersion': '2',
                    'c-demographicCategoryName': 'height',
                    'c-demographicValue': '170',
                    'c-demographicUnits': 'cm'
                }
            },
            {
                values: {
                    'c-healthCode': 'hc-1',
                    'c-participantVersion': '2',
                    'c-demographicCategoryName': 'ethnicity',
                    'c-demographicValue': 'a'
                }
            },
            {
                values: {
                    'c-healthCode': 'hc-1',
                    'c-participantVersion': '2',
                    'c-demographicCategoryName': 'ethnicity',
                    'c-demographicValue': 'b'
                }
            }
        ]);
    });

    it('should return nothing without demographics', () => {
        let pv = decodeParticipantVersion({ healthCode: 'hc-1', participantVersion: 2 });
        expect(buildDemographicRows(ctx, 'app-1', null, demographicColumns, pv)).toEqual([]);
    });
});
