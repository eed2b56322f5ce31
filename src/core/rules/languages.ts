/**
 * Per-language file conventions.
 */
import type { Language } from './schema.js';

export interface LanguageProfile {
  /** Extension of planned source files */
  extension: string;
  /** Extensions recognized as source when scanning */
  extensions: string[];
  /** Default co-located test file name */
  testPattern: string;
}

export const LANGUAGE_PROFILES: Record<Language, LanguageProfile> = {
  typescript: {
    extension: '.ts',
    extensions: ['.ts', '.tsx', '.js', '.jsx'],
    testPattern: '{stem}.test{ext}',
  },
  go: {
    extension: '.go',
    extensions: ['.go'],
    testPattern: '{stem}_test{ext}',
  },
};
