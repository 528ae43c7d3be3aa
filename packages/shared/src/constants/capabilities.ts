import type { RuleLevel } from '../types';

export const LEVEL1_CAPABILITIES = [
  'checkValidFileFormat',
  'checkNoImagesOrObjects',
  'checkOneTablePerSheet',
  'checkNoHiddenRowsOrColumns',
  'checkNoNotesOutsideTable',
  'checkNoMergedCells',
  'checkNoFormatBasedSemantics',
  'checkNoWhitespaceFormatting',
  'checkSingleDataPerCell',
  'checkNoPlatformDependentCharacters',
  'checkFormatNativeStructure',
] as const;

export const LEVEL2_CAPABILITIES = [
  'checkNumericColumnsOnly',
  'checkSeparateOtherDetailColumns',
  'checkNoMissingColumnHeaders',
  'checkHandlingOfMissingValues',
] as const;

export const LEVEL3_CAPABILITIES = [
  'checkCodeFormatForChoices',
  'checkCodebookExists',
  'checkQuestionMasterExists',
  'checkMetadataPresence',
  'checkLongFormatIfManyColumns',
] as const;

export type Level1CapabilityName = (typeof LEVEL1_CAPABILITIES)[number];
export type Level2CapabilityName = (typeof LEVEL2_CAPABILITIES)[number];
export type Level3CapabilityName = (typeof LEVEL3_CAPABILITIES)[number];

export const LEVEL_CAPABILITIES: Record<RuleLevel, readonly string[]> = {
  1: LEVEL1_CAPABILITIES,
  2: LEVEL2_CAPABILITIES,
  3: LEVEL3_CAPABILITIES,
};
