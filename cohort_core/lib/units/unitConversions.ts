import { z } from 'zod';
import rawConversions from './data/unit_conversions.json';

const AlternativeUnitSchema = z.object({
    unit: z.string().min(1),
    /** standard = value * scale + offset */
    scale: z.number().positive(),
    offset: z.number(),
});

const UnitProfileSchema = z.object({
    aliases: z.array(z.string()),
    standardUnit: z.string().min(1),
    alternatives: z.array(AlternativeUnitSchema),
});

const UnitTableSchema = z.record(z.string(), UnitProfileSchema);

export type AlternativeUnit = z.infer<typeof AlternativeUnitSchema>;

export interface UnitProfile {
    test: string;
    aliases: readonly string[];
    standardUnit: string;
    alternatives: readonly AlternativeUnit[];
}

const UNIT_TABLE: readonly UnitProfile[] = Object.entries(UnitTableSchema.parse(rawConversions))
    .map(([test, profile]) => ({ test, ...profile }));

function normalizeLabel(label: string): string {
    return label.toLowerCase().replace(/[\s_-]+/g, ' ').trim();
}

function normalizeUnit(unit: string): string {
    return unit.toLowerCase().replace(/\s+/g, '').replace('μ', 'u').replace('µ', 'u');
}

/**
 * Finds the unit profile for a lab concept label such as "HbA1c" or "fasting glucose".
 * Longer names win so "ldl cholesterol" is not read as "hdl".
 */
export function findUnitProfile(label: string): UnitProfile | null {
    const normalized = normalizeLabel(label);
    const compact = normalized.replace(/\s+/g, '');
    const candidates = UNIT_TABLE
        .flatMap((profile) => [profile.test, ...profile.aliases].map((name) => ({ profile, name: normalizeLabel(name) })))
        .sort((left, right) => right.name.length - left.name.length);

    const match = candidates.find(({ name }) => {
        if (normalized === name || compact === name.replace(/\s+/g, '')) {
            return true;
        }
        return new RegExp(`(^|[^a-z0-9])${escapeRegExp(name)}([^a-z0-9]|$)`).test(normalized);
    });

    return match?.profile ?? null;
}

export function listSupportedTests(): string[] {
    return UNIT_TABLE.map((profile) => profile.test);
}

export function isStandardUnit(profile: UnitProfile, unit: string): boolean {
    return normalizeUnit(profile.standardUnit) === normalizeUnit(unit);
}

export function findAlternativeUnit(profile: UnitProfile, unit: string): AlternativeUnit | null {
    const wanted = normalizeUnit(unit);
    return profile.alternatives.find((alternative) => normalizeUnit(alternative.unit) === wanted) ?? null;
}

/**
 * Converts a value expressed in `unit` to the profile's standard unit.
 * Returns null for units the profile does not know.
 */
export function toStandardUnit(profile: UnitProfile, value: number, unit: string): number | null {
    if (isStandardUnit(profile, unit)) {
        return value;
    }
    const alternative = findAlternativeUnit(profile, unit);
    return alternative === null ? null : value * alternative.scale + alternative.offset;
}

export function normalizedUnitKey(unit: string): string {
    return normalizeUnit(unit);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
