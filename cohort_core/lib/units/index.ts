export {
    findAlternativeUnit,
    findUnitProfile,
    isStandardUnit,
    listSupportedTests,
    normalizedUnitKey,
    toStandardUnit,
} from './unitConversions';
export type { AlternativeUnit, UnitProfile } from './unitConversions';
