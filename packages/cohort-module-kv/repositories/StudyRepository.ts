import { inject, injectable } from 'inversify';
import { Context } from '../../cohort-utils/Context';
import { StoreTables } from '../../cohort-config/Config';
import { NotFoundError } from '../../cohort-errors/NotFoundError';
import { decodeOrThrow } from '../../cohort-errors/decode';
import { DocumentStore } from '../store/DocumentStore';
import { StudyInfo, StudyItem } from '../model/StudyInfo';

@injectable()
export class StudyRepository {
    private readonly store: DocumentStore;
    private readonly tables: StoreTables;

    constructor(
        @inject('DocumentStore') store: DocumentStore,
        @inject('StoreTables') tables: StoreTables
    ) {
        this.store = store;
        this.tables = tables;
    }

    async getStudy(ctx: Context, studyId: string): Promise<StudyInfo> {
        let item = await this.store.getItem(ctx, this.tables.study, { identifier: studyId });
        if (!item) {
            throw new NotFoundError('Study not found: ' + studyId);
        }
        let study = decodeOrThrow(StudyItem, item, 'study ' + studyId);
        return {
            studyId: studyId,
            name: study.name,
            shortName: study.shortName || null,
            supportEmail: study.supportEmail || null
        };
    }
}
