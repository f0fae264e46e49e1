import * as t from 'io-ts';
import { decodeOrThrow } from '../../cohort-errors/decode';

const IsoDate = new t.Type<Date, string, unknown>(
    'IsoDate',
    (u): u is Date => u instanceof Date,
    (u, c) => {
        if (u instanceof Date) {
            return t.success(u);
        }
        if (typeof u !== 'string') {
            return t.failure(u, c);
        }
        let d = new Date(u);
        return isNaN(d.getTime()) ? t.failure(u, c) : t.success(d);
    },
    (a) => a.toISOString()
);

const optional = <C extends t.Mixed>(codec: C) => t.union([codec, t.null, t.undefined]);

export const DemographicResponseCodec = t.type({
    units: optional(t.string),
    values: t.array(t.string)
});

export type DemographicResponse = t.TypeOf<typeof DemographicResponseCodec>;

export const ParticipantVersionCodec = t.partial({
    healthCode: optional(t.string),
    participantVersion: optional(t.Int),
    createdOn: optional(IsoDate),
    modifiedOn: optional(IsoDate),
    dataGroups: optional(t.array(t.string)),
    languages: optional(t.array(t.string)),
    sharingScope: optional(t.string),
    // studyId -> external ID or '<none>'
    studyMemberships: optional(t.record(t.string, t.string)),
    timeZone: optional(t.string),
    appDemographics: optional(t.record(t.string, optional(DemographicResponseCodec)))
});

export type ParticipantVersion = t.TypeOf<typeof ParticipantVersionCodec>;

export function decodeParticipantVersion(value: unknown): ParticipantVersion {
    return decodeOrThrow(ParticipantVersionCodec, value, 'participant version');
}
