import type { DomainMappings, PopulationMapping } from './types';

export const DEFAULT_POPULATION: PopulationMapping = {
    table: 'patients',
    subjectColumn: 'patient_id',
    enrollmentStartColumn: 'enrollment_start_date',
    enrollmentEndColumn: 'enrollment_end_date',
};

/** Claims-style layout: one claims table for clinical events, demographics on patients. */
export const DEFAULT_DOMAIN_MAPPINGS: DomainMappings = {
    diagnosis: {
        table: 'claims',
        codeColumns: ['primary_diagnosis_code', 'secondary_diagnosis_code', 'tertiary_diagnosis_code'],
        dateColumn: 'service_date',
        reference: { table: 'ref_icd10', codeColumn: 'icd_10_code', descriptionColumn: 'description' },
    },
    procedure: {
        table: 'claims',
        codeColumns: ['cpt_code', 'hcpcs_code'],
        dateColumn: 'service_date',
        reference: { table: 'ref_cpt', codeColumn: 'cpt_code', descriptionColumn: 'description' },
    },
    drug: {
        table: 'claims',
        codeColumns: ['ndc_code'],
        dateColumn: 'service_date',
        ingredientColumn: 'drug_name',
        reference: { table: 'ref_ndc', codeColumn: 'ndc_code', descriptionColumn: 'drug_name', groupColumn: 'drug_class' },
    },
    lab: {
        table: 'labs',
        codeColumns: ['loinc_code'],
        dateColumn: 'result_date',
        valueColumn: 'result_value',
        unitColumn: 'result_unit',
    },
    demographic: {
        table: 'patients',
        codeColumns: [],
        conceptColumns: {
            age: 'age',
            gender: 'gender',
            sex: 'gender',
            race: 'race',
            ethnicity: 'ethnicity',
            state: 'state',
        },
    },
    enrollment: {
        table: 'patients',
        codeColumns: [],
        startColumn: 'enrollment_start_date',
        endColumn: 'enrollment_end_date',
    },
};

export const TABLE_DESCRIPTIONS: Readonly<Record<string, string>> = {
    claims: 'Claims with diagnoses, procedures, drugs and services',
    patients: 'Patient demographics and enrollment periods',
    labs: 'Laboratory results with values and units',
    ref_icd10: 'ICD-10 diagnosis code reference',
    ref_cpt: 'CPT procedure code reference',
    ref_ndc: 'NDC drug code reference',
};
