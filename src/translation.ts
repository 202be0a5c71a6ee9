import { config, SUPPORTED_LANGUAGES } from './config';
import { ValidationError } from './errors';
import { Translator } from './textGeneration';
import { TranslationResult } from './types/Insights';
import { TranslationCacheRepository } from './types/repositories';
import { Clock, sanitizeText } from './utils';

export interface TranslationOptions {
  cacheTtlMs?: number;
  clock?: Clock;
}

export function isSupportedLanguage(language: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, language);
}

/**
 * Message translation with a per-(message, language) cache.
 * Rate-limit errors from the model propagate with their retry-after;
 * there is no retry here.
 */
export class TranslationService {
  private readonly cacheTtlMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly cache: TranslationCacheRepository,
    private readonly translator: Translator,
    options: TranslationOptions = {}
  ) {
    this.cacheTtlMs = options.cacheTtlMs ?? config.translation.cacheTtlMs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Translate a message, serving repeats from the cache while fresh
   *
   * @param messageId - Cache key together with the language
   * @param text - Message text as stored
   * @param targetLanguage - ISO 639-1 code, any case
   */
  async translate(messageId: string, text: string, targetLanguage: string): Promise<TranslationResult> {
    // 1. Validate input
    if (!messageId) {
      throw new ValidationError('messageId is required');
    }
    const language = targetLanguage.trim().toLowerCase();
    if (!isSupportedLanguage(language)) {
      throw new ValidationError(`Unsupported target language: ${targetLanguage}`, 'INVALID_TARGET_LANGUAGE');
    }
    const cleaned = sanitizeText(text);
    if (!cleaned) {
      throw new ValidationError('Text to translate must not be empty', 'EMPTY_TEXT');
    }

    // 2. Check the cache
    const cached = await this.cache.get(messageId, language);
    if (cached && this.clock() - cached.cachedAt < this.cacheTtlMs) {
      console.log(`✅ Translation cache hit for ${messageId} (${language})`);
      return {
        translatedText: cached.translatedText,
        detectedLanguage: cached.detectedLanguage,
        targetLanguage: language,
        fromCache: true,
      };
    }

    // 3. Translate and cache the result
    const { translatedText, detectedLanguage } = await this.translator.translateText(cleaned, language);

    await this.cache.put({
      messageId,
      targetLanguage: language,
      translatedText,
      detectedLanguage,
      cachedAt: this.clock(),
    });

    console.log(`🌐 Translated ${messageId} from ${detectedLanguage} to ${language}`);
    return { translatedText, detectedLanguage, targetLanguage: language, fromCache: false };
  }
}
