import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { KeyedLock } from '../../cohort-utils/KeyedLock';
import { decodeOrThrow } from '../../cohort-errors/decode';
import { createLogger } from '../../cohort-log/createLogger';
import { DocumentStore } from '../store/DocumentStore';
import { StringSet } from '../model/codecs';

const ATTR_STUDY_ID = 'studyId';
const ATTR_TABLE_ID_SET = 'tableIdSet';

const log = createLogger('survey-tables');

/**
 * Set of survey table IDs per study. Survey tasks run in parallel, so every
 * read-modify-write of a study's set is serialized per study.
 */
@injectable()
export class SurveyTableRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;
    private readonly locks = new KeyedLock();

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables
    ) {
        this.store = store;
        this.tables = tables;
    }

    /**
     * Survey table IDs of the study. Empty, never null.
     */
    async getSurveyTableIds(ctx: Context, studyId: string): Promise<Set<string>> {
        let item = await this.store.getItem(ctx, this.tables.surveyTables, { [ATTR_STUDY_ID]: studyId });
        if (!item || item[ATTR_TABLE_ID_SET] === undefined || item[ATTR_TABLE_ID_SET] === null) {
            return new Set();
        }
        return decodeOrThrow(StringSet, item[ATTR_TABLE_ID_SET], 'survey table set for study ' + studyId);
    }

    async addSurveyTableMapping(ctx: Context, studyId: string, tableId: string) {
        await this.locks.inLock(studyId, async () => {
            let tableIds = await this.getSurveyTableIds(ctx, studyId);
            if (tableIds.has(tableId)) {
                return;
            }
            tableIds.add(tableId);
            await this.store.updateItem(ctx, this.tables.surveyTables, { [ATTR_STUDY_ID]: studyId }, {
                set: { [ATTR_TABLE_ID_SET]: tableIds }
            });
        });
    }

    /**
     * Removes the table from the study's set. Does nothing if the study or table is already gone.
     * The attribute is cleared when the last table is removed, since the store can't hold empty sets.
     */
    async removeSurveyTableMapping(ctx: Context, studyId: string, tableId: string) {
        await this.locks.inLock(studyId, async () => {
            let tableIds = await this.getSurveyTableIds(ctx, studyId);
            if (!tableIds.has(tableId)) {
                return;
            }

            tableIds.delete(tableId);
            if (tableIds.size === 0) {
                log.log(ctx, 'Clearing survey tables of ' + studyId);
                await this.store.updateItem(ctx, this.tables.surveyTables, { [ATTR_STUDY_ID]: studyId }, {
                    remove: [ATTR_TABLE_ID_SET]
                });
            } else {
                await this.store.updateItem(ctx, this.tables.surveyTables, { [ATTR_STUDY_ID]: studyId }, {
                    set: { [ATTR_TABLE_ID_SET]: tableIds }
                });
            }
        });
    }
}
