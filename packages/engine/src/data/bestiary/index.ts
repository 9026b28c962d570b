import { DEFAULT_BESTIARY_SOURCE } from './default-bestiary';
import { parseBestiary } from './parser';

export * from './contracts';
export { parseBestiary, validateBestiary, BestiaryValidationError, type BestiaryValidationIssue } from './parser';

export const DEFAULT_BESTIARY = parseBestiary(DEFAULT_BESTIARY_SOURCE);
