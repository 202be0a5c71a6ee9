// Metadata stored next to each vector. Text is capped before upsert.
export type EmbeddingMetadata = {
  messageId: string;
  conversationId: string;
  text: string;
  timestamp: number;
  userId: string;
};

export interface VectorMatch {
  id: string;
  score: number;
  metadata: EmbeddingMetadata;
}

export interface SupportingMessage {
  messageId: string;
  text: string;
  timestamp: number;
  senderId: string;
  score: number;
}

export interface InsightAnswer {
  answerText: string;
  supportingMessages: SupportingMessage[];
}

export interface InsightContextMessage {
  text: string;
  timestamp: number;
}

export interface TranslationResult {
  translatedText: string;
  detectedLanguage: string;
  targetLanguage: string;
  fromCache: boolean;
}

export interface CachedTranslation {
  messageId: string;
  targetLanguage: string;
  translatedText: string;
  detectedLanguage: string;
  cachedAt: number;
}

export type MentionReason = 'mentioned' | 'starred';

export interface MentionedMessage {
  id: string;
  messageId: string;
  conversationId: string;
  conversationTitle: string;
  messageText: string;
  senderId: string;
  senderName: string;
  reason: MentionReason;
  createdAt: number;
  isRead: boolean;
}
