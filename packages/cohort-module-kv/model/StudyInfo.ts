import * as t from 'io-ts';
import { nullable } from './codecs';

export interface StudyInfo {
    studyId: string;
    name: string;
    shortName: string | null;
    supportEmail: string | null;
}

export const StudyItem = t.intersection([
    t.type({
        identifier: t.string,
        name: t.string
    }),
    t.partial({
        shortName: nullable(t.string),
        supportEmail: nullable(t.string)
    })
]);
