import { describe, expect, it } from 'vitest';
import { findAlternativeUnit, findUnitProfile, isStandardUnit, listSupportedTests, normalizedUnitKey, toStandardUnit } from '../../lib/units';
import type { UnitProfile } from '../../lib/units';

function profileFor(label: string): UnitProfile {
    const profile = findUnitProfile(label);
    if (profile === null) {
        throw new Error(`no unit profile for ${label}`);
    }
    return profile;
}

describe('findUnitProfile', () => {
    it('matches test names and aliases regardless of case and separators', () => {
        expect(findUnitProfile('HbA1c')?.test).toBe('hba1c');
        expect(findUnitProfile('Hemoglobin A1c')?.test).toBe('hba1c');
        expect(findUnitProfile('Fasting Glucose')?.test).toBe('glucose');
        expect(findUnitProfile('estimated_gfr')?.test).toBe('egfr');
        expect(findUnitProfile('LDL-C')?.test).toBe('ldl');
    });

    it('prefers the longest matching name', () => {
        expect(findUnitProfile('LDL cholesterol')?.test).toBe('ldl');
        expect(findUnitProfile('most recent serum creatinine')?.test).toBe('creatinine');
    });

    it('returns null for labs without a profile', () => {
        expect(findUnitProfile('serum sodium')).toBeNull();
    });

    it('lists every supported test', () => {
        expect(listSupportedTests()).toEqual(['egfr', 'hba1c', 'glucose', 'creatinine', 'uacr', 'ldl', 'hdl']);
    });
});

describe('toStandardUnit', () => {
    it('passes standard units through', () => {
        const hba1c = profileFor('hba1c');

        expect(toStandardUnit(hba1c, 7, ' % ')).toBe(7);
        expect(isStandardUnit(profileFor('egfr'), 'ml/min/1.73M2')).toBe(true);
    });

    it('converts alternative units with scale and offset', () => {
        expect(toStandardUnit(profileFor('hba1c'), 64, 'mmol/mol')).toBeCloseTo(8.006, 6);
        expect(toStandardUnit(profileFor('glucose'), 5, 'mmol/L')).toBe(90);
    });

    it('treats micro signs as u', () => {
        const creatinine = profileFor('creatinine');

        expect(normalizedUnitKey('µmol/L')).toBe('umol/l');
        expect(normalizedUnitKey('μmol/L')).toBe('umol/l');
        expect(findAlternativeUnit(creatinine, 'µmol/L')?.unit).toBe('umol/L');
        expect(toStandardUnit(creatinine, 100, 'µmol/L')).toBeCloseTo(1.1312, 6);
    });

    it('returns null for units the profile does not know', () => {
        expect(toStandardUnit(profileFor('glucose'), 5, 'g/L')).toBeNull();
        expect(findAlternativeUnit(profileFor('egfr'), 'mL/s')).toBeNull();
    });
});
