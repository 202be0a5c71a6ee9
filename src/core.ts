import { ArchiveMessageStore } from './archive';
import { ArchivalCoordinator, ArchivalOptions } from './archival';
import { ConversationDirectory } from './conversations';
import { Embedder, OpenAIEmbeddingGenerator } from './embeddings';
import { FirestoreArchiveRepository, FirestoreConversationRepository } from './firebase/firestoreRepositories';
import {
  RealtimeLiveMessageRepository,
  RealtimeMentionRepository,
  RealtimeTranslationCacheRepository,
  RealtimeTypingRepository,
  RealtimeUserStatusRepository,
} from './firebase/realtimeRepositories';
import { LiveMessageStore } from './liveMessages';
import { MentionService } from './mentions';
import { MessageEmbedder } from './messageEmbedding';
import { MessagingService } from './messaging';
import { MessageEvents } from './notifications';
import { RetrievalOrchestrator, RetrievalOptions } from './retrieval';
import { InsightGenerator, OpenAITextGenerator, Translator } from './textGeneration';
import { ConversationTimeline } from './timeline';
import { TranslationService } from './translation';
import { TypingIndicators } from './typing';
import {
  ArchiveRepository,
  ConversationRepository,
  LiveMessageRepository,
  MentionRepository,
  TranslationCacheRepository,
  TypingRepository,
  UserStatusRepository,
} from './types/repositories';
import { Clock } from './utils';
import { PineconeVectorIndex, VectorIndexClient } from './vectorIndex';

export interface Repositories {
  live: LiveMessageRepository;
  archive: ArchiveRepository;
  conversations: ConversationRepository;
  statuses: UserStatusRepository;
  typing: TypingRepository;
  translations: TranslationCacheRepository;
  mentions: MentionRepository;
}

export interface AiClients {
  embedder: Embedder;
  vectorIndex: VectorIndexClient;
  translator: Translator;
  insights: InsightGenerator;
}

export interface CoreOptions {
  clock?: Clock;
  archival?: ArchivalOptions;
  retrieval?: RetrievalOptions;
  typingTtlMs?: number;
  generateId?: () => string;
}

export interface MessagingCore {
  directory: ConversationDirectory;
  live: LiveMessageStore;
  archive: ArchiveMessageStore;
  archival: ArchivalCoordinator;
  typing: TypingIndicators;
  mentions: MentionService;
  translation: TranslationService;
  retrieval: RetrievalOrchestrator;
  embeddings: MessageEmbedder;
  events: MessageEvents;
  messaging: MessagingService;
}

export function createMessagingCore(repos: Repositories, ai: AiClients, options: CoreOptions = {}): MessagingCore {
  const clock = options.clock ?? Date.now;

  const timeline = new ConversationTimeline(repos.live, repos.archive);
  const directory = new ConversationDirectory(repos.conversations, repos.statuses, timeline, clock);
  const typing = new TypingIndicators(repos.typing, { ttlMs: options.typingTtlMs, clock });
  const live = new LiveMessageStore(repos.live, directory, typing, { clock, generateId: options.generateId });
  const archive = new ArchiveMessageStore(repos.archive);
  const archival = new ArchivalCoordinator(live, archive, options.archival);
  const mentions = new MentionService(repos.mentions, directory, clock);
  const translation = new TranslationService(repos.translations, ai.translator, { clock });
  const retrieval = new RetrievalOrchestrator(ai.embedder, ai.vectorIndex, ai.insights, options.retrieval);
  const embeddings = new MessageEmbedder(ai.embedder, ai.vectorIndex, live);
  const events = new MessageEvents();

  const messaging = new MessagingService({
    directory,
    live,
    archive,
    archival,
    mentions,
    translation,
    events,
    typing,
    embeddings,
  });

  return { directory, live, archive, archival, typing, mentions, translation, retrieval, embeddings, events, messaging };
}

export function createFirebaseRepositories(): Repositories {
  return {
    live: new RealtimeLiveMessageRepository(),
    archive: new FirestoreArchiveRepository(),
    conversations: new FirestoreConversationRepository(),
    statuses: new RealtimeUserStatusRepository(),
    typing: new RealtimeTypingRepository(),
    translations: new RealtimeTranslationCacheRepository(),
    mentions: new RealtimeMentionRepository(),
  };
}

export function createAiClients(): AiClients {
  const generator = new OpenAITextGenerator();
  return {
    embedder: new OpenAIEmbeddingGenerator(),
    vectorIndex: new PineconeVectorIndex(),
    translator: generator,
    insights: generator,
  };
}
