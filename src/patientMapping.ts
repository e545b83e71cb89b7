import _ from 'lodash';
import {
    GENDERS,
    PATIENT_RESOURCE_TYPE,
    type ContactPoint,
    type Gender,
    type HumanName,
    type Patient,
    type PatientDraft,
    type PatientPhoto,
} from './types.js';

export function emptyDraft(): PatientDraft {
    return { telecom: [] };
}

/**
 * Maps a wire `gender` code to a `Gender`. Any code outside the fixed set
 * silently becomes 'unknown'; the original code is lost.
 */
export function decodeGender(code: string): Gender {
    const match = GENDERS.find(g => g === code);
    if (!match) {
        console.warn(`[MAPPING] Unrecognized gender code "${code}", using "unknown"`);
        return 'unknown';
    }
    return match;
}

function firstFamily(name: HumanName | undefined): string | undefined {
    const family = name?.family;
    return Array.isArray(family) ? family[0] : family;
}

function decodePhoto(patient: Patient): PatientPhoto | undefined {
    const photo = patient.photo?.[0];
    if (!photo?.data) return undefined;
    return {
        contentType: photo.contentType ?? 'application/octet-stream',
        data: Buffer.from(photo.data, 'base64'),
    };
}

export function cloneDraft(draft: PatientDraft): PatientDraft {
    return {
        ...draft,
        telecom: _.cloneDeep(draft.telecom),
        photo: draft.photo && { contentType: draft.photo.contentType, data: Buffer.from(draft.photo.data) },
    };
}

/**
 * Populates a draft from a patient resource. Only the first name entry and
 * the first photo are used. A missing gender stays unset.
 */
export function draftFromPatient(patient: Patient): PatientDraft {
    const name = patient.name?.[0];
    return {
        givenName: name?.given?.[0],
        familyName: firstFamily(name),
        birthDate: patient.birthDate,
        gender: patient.gender === undefined ? undefined : decodeGender(patient.gender),
        telecom: _.cloneDeep(patient.telecom ?? []),
        photo: decodePhoto(patient),
    };
}

/**
 * Writes the draft's fields onto a copy of `base` (or a fresh resource).
 * The draft owns `name[0].given[0]`, `name[0].family`, `birthDate`, `gender`,
 * `telecom` and `photo[0]`; everything else on `base` is kept.
 */
export function patientFromDraft(draft: PatientDraft, base?: Patient): Patient {
    const patient: Patient = base ? _.cloneDeep(base) : { resourceType: PATIENT_RESOURCE_TYPE };

    const [primary, ...otherNames] = patient.name ?? [];
    const name: HumanName = { ...primary };
    if (draft.givenName === undefined) {
        delete name.given;
    } else {
        name.given = [draft.givenName, ...(name.given?.slice(1) ?? [])];
    }
    if (draft.familyName === undefined) {
        delete name.family;
    } else if (Array.isArray(name.family)) {
        // List-valued family names keep their shape and trailing parts.
        name.family = [draft.familyName, ...name.family.slice(1)];
    } else {
        name.family = draft.familyName;
    }
    const names = Object.keys(name).length > 0 ? [name, ...otherNames] : otherNames;
    if (names.length > 0) {
        patient.name = names;
    } else {
        delete patient.name;
    }

    if (draft.birthDate === undefined) {
        delete patient.birthDate;
    } else {
        patient.birthDate = draft.birthDate;
    }

    if (draft.gender === undefined) {
        delete patient.gender;
    } else {
        patient.gender = draft.gender;
    }

    if (draft.telecom.length > 0) {
        patient.telecom = _.cloneDeep(draft.telecom);
    } else {
        delete patient.telecom;
    }

    // The draft owns photo[0] only when it carries inline data; a URL-only
    // attachment there never reached the draft and is left alone.
    if (!draft.photo && patient.photo?.[0] && !patient.photo[0].data) {
        return patient;
    }

    const otherPhotos = patient.photo?.slice(1) ?? [];
    const photos = draft.photo
        ? [{ contentType: draft.photo.contentType, data: draft.photo.data.toString('base64') }, ...otherPhotos]
        : otherPhotos;
    if (photos.length > 0) {
        patient.photo = photos;
    } else {
        delete patient.photo;
    }

    return patient;
}

/** "Doe, Jane" style label for listings. */
export function displayName(patient: Patient): string {
    const name = patient.name?.[0];
    const parts = [firstFamily(name), name?.given?.[0]].filter((p): p is string => !!p);
    return parts.length > 0 ? parts.join(', ') : '(unnamed)';
}

export function contactPoint(system: NonNullable<ContactPoint['system']>, value: string, use?: ContactPoint['use']): ContactPoint {
    return use ? { system, value, use } : { system, value };
}
