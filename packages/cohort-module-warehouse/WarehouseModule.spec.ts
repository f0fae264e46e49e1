import { testEnvironmentEnd, testEnvironmentStart, TestEnvironment } from '../cohort-modules/testEnvironment';
import { Modules } from '../cohort-modules/Modules';
import { createNamedContext } from '../cohort-utils/Context';
import { decodeParticipantVersion } from './model/ParticipantVersion';
import { Columns } from './rows/buildRows';

describe('WarehouseModule', () => {
    const ctx = createNamedContext('test');
    let env: TestEnvironment;

    beforeAll(async () => {
        env = await testEnvironmentStart('warehouse');
        env.warehouse
            .defineTable('versions', [Columns.healthCode, Columns.participantVersion, Columns.dataGroups, Columns.studyMemberships])
            .defineTable('demographics', [Columns.healthCode, Columns.participantVersion, Columns.demographicCategoryName, Columns.demographicValue]);
    });
    afterAll(async () => {
        await testEnvironmentEnd();
    });

    it('should export participant version with demographics', async () => {
        let pv = decodeParticipantVersion({
            healthCode: 'hc-1',
            participantVersion: 1,
            dataGroups: ['b', 'a'],
            studyMemberships: { 'study-1': 'ext-1', 'study-2': 'ext-2' },
            appDemographics: { education: { values: ['college'] } }
        });
        await Modules.Warehouse.exportParticipantVersion(ctx, 'app-1', 'study-1', {
            participantVersionTableId: 'versions',
            demographicsTableId: 'demographics'
        }, pv);

        expect(env.warehouse.appended).toEqual([{
            tableId: 'versions',
            rows: [{
                values: {
                    'id-healthCode': 'hc-1',
                    'id-participantVersion': '1',
                    'id-dataGroups': 'a,b',
                    'id-studyMemberships': '|study-1=ext-1|'
                }
            }]
        }, {
            tableId: 'demographics',
            rows: [{
                values: {
                    'id-healthCode': 'hc-1',
                    'id-participantVersion': '1',
                    'id-demographicCategoryName': 'education',
                    'id-demographicValue': 'college'
                }
            }]
        }]);
    });

    it('should resolve column ids once', async () => {
        let before = env.warehouse.columnRequests;
        let warehouse = Modules.Warehouse;
        await warehouse.buildParticipantVersionRow(ctx, null, 'versions', decodeParticipantVersion({ healthCode: 'hc-2' }));
        await warehouse.buildParticipantVersionRow(ctx, null, 'versions', decodeParticipantVersion({ healthCode: 'hc-3' }));
        expect((await warehouse.resolveColumnIds(ctx, 'versions')).get(Columns.healthCode)).toBe('id-healthCode');
        expect(env.warehouse.columnRequests).toBe(before);
    });

    it('should skip demographics append without rows', async () => {
        let before = env.warehouse.appended.length;
        await Modules.Warehouse.exportParticipantVersion(ctx, 'app-1', null, {
            participantVersionTableId: 'versions',
            demographicsTableId: 'demographics'
        }, decodeParticipantVersion({ participantVersion: 2 }));
        expect(env.warehouse.appended.slice(before)).toEqual([{
            tableId: 'versions',
            rows: [{ values: { 'id-participantVersion': '2' } }]
        }]);
    });
});
