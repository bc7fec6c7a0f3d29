import { franc } from 'franc';
import { DetectedLanguage } from '../types/index.js';

const ISO_639_3_TO_1: Record<string, DetectedLanguage> = {
  eng: 'en',
  rus: 'ru',
  spa: 'es'
};

/**
 * Tags transcript text with one of the supported languages
 */
export class LanguageDetector {
  constructor(private readonly minimumTextLength: number = 10) {}

  detect(text: string): DetectedLanguage | undefined {
    const trimmed = text.trim();
    if (trimmed.length < this.minimumTextLength) {
      return undefined;
    }

    const code = franc(trimmed, {
      only: Object.keys(ISO_639_3_TO_1),
      minLength: this.minimumTextLength
    });
    return ISO_639_3_TO_1[code];
  }
}
