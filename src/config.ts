function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`⚠️ Ignoring ${name}=${raw}, not a number. Using ${fallback}`);
    return fallback;
  }
  return value;
}

export const SUPPORTED_LANGUAGES: Readonly<Record<string, string>> = {
  en: 'English',
  zh: 'Chinese',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  ja: 'Japanese',
  ko: 'Korean',
  pt: 'Portuguese',
  ru: 'Russian',
  ar: 'Arabic',
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const config = {
  archive: {
    // live window size before the oldest messages move to the archive
    threshold: readNumber('ARCHIVE_THRESHOLD', 50),
    maxPageSize: 100,
    retryDelaysMs: [250, 1000, 5000],
  },
  typing: {
    ttlMs: readNumber('TYPING_TTL_MS', 5000),
    sweepIntervalMs: 1000,
  },
  messages: {
    maxTextLength: 10000,
  },
  openai: {
    chatModel: 'gpt-4o-mini',
    embeddingModel: 'text-embedding-3-small',
    embeddingDimensions: 1536,
    timeoutMs: readNumber('MODEL_TIMEOUT_MS', 20000),
    translationTemperature: 0.3,
    translationMaxTokens: 1000,
    insightTemperature: 0.7,
    insightMaxTokens: 500,
  },
  pinecone: {
    indexName: process.env.PINECONE_INDEX_NAME || 'conversation-messages',
    metadataTextLimit: 1000,
    deleteBatchSize: 1000,
  },
  rag: {
    similarityThreshold: readNumber('RAG_SIMILARITY_THRESHOLD', 0.75),
    defaultTopK: 5,
    maxTopK: 20,
  },
  translation: {
    cacheTtlMs: 30 * DAY_MS,
  },
};
