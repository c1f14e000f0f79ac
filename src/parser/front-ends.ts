import { type SourceLanguage, getLanguageFromExtension } from '../utils/file-scanner.js';
import type { LanguageFrontEnd } from './front-end.js';
import { pythonFrontEnd } from './python-front-end.js';
import { javascriptFrontEnd, typescriptFrontEnd } from './typescript-front-end.js';

const FRONT_ENDS: Record<SourceLanguage, LanguageFrontEnd> = {
  python: pythonFrontEnd,
  typescript: typescriptFrontEnd,
  javascript: javascriptFrontEnd,
};

export function getFrontEnd(filePath: string): LanguageFrontEnd | null {
  const language = getLanguageFromExtension(filePath);
  return language ? FRONT_ENDS[language] : null;
}

export function frontEndFor(language: SourceLanguage): LanguageFrontEnd {
  return FRONT_ENDS[language];
}
