import { Context } from '../../cohort-utils/Context';
import { createLogger } from '../../cohort-log/createLogger';

export const MAX_LANGUAGES = 10;
export const MAX_LANGUAGE_LENGTH = 5;

// Membership without an external ID
export const EXT_ID_NONE = '<none>';

const log = createLogger('warehouse-rows');

/**
 * Data groups are unordered, sorted to get a canonical form.
 */
export function serializeDataGroups(dataGroups: string[]) {
    return [...dataGroups].sort().join(',');
}

/**
 * Truncates the list to MAX_LANGUAGES entries and each entry to MAX_LANGUAGE_LENGTH characters.
 * Order is kept.
 */
export function sanitizeLanguages(ctx: Context, languages: string[], owner: string): string[] {
    let res = languages;
    if (res.length > MAX_LANGUAGES) {
        log.warn(ctx, 'Truncating language list; ' + owner + ' has ' + res.length + ' languages');
        res = res.slice(0, MAX_LANGUAGES);
    }
    return res.map((language) => {
        if (language.length > MAX_LANGUAGE_LENGTH) {
            log.warn(ctx, 'Truncating language; ' + owner + ' has invalid language ' + language);
            return language.substring(0, MAX_LANGUAGE_LENGTH);
        }
        return language;
    });
}

export function serializeLanguages(ctx: Context, languages: string[], owner: string) {
    return JSON.stringify(sanitizeLanguages(ctx, languages, owner));
}

/**
 * Serializes memberships as `|studyA=extA|studyB=|`, pairs sorted. With a filter only that study is written.
 * Returns null when there is nothing to write.
 */
export function serializeStudyMemberships(studyIdFilter: string | null, memberships: { [studyId: string]: string } | null | undefined): string | null {
    if (!memberships) {
        return null;
    }
    let studyIds = Object.keys(memberships);
    if (studyIdFilter !== null) {
        studyIds = studyIds.filter((studyId) => studyId === studyIdFilter);
    }
    if (studyIds.length === 0) {
        return null;
    }
    let pairs = studyIds.map((studyId) => {
        let externalId = memberships[studyId];
        return studyId + '=' + (externalId === EXT_ID_NONE ? '' : externalId);
    });
    pairs.sort();
    return '|' + pairs.join('|') + '|';
}
