import OpenAI from 'openai';
import { config, SUPPORTED_LANGUAGES } from './config';
import { MalformedModelResponseError } from './errors';
import { getOpenAI, toModelError } from './openaiClient';
import { InsightContextMessage } from './types/Insights';

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  systemPrompt: string;
  messages: ChatTurn[];
  temperature?: number;
  maxTokens?: number;
  json?: boolean;
}

export interface Translator {
  translateText(text: string, targetLanguage: string): Promise<{ translatedText: string; detectedLanguage: string }>;
}

export interface InsightGenerator {
  generateInsight(query: string, context: InsightContextMessage[]): Promise<string>;
}

const INSIGHT_SYSTEM_PROMPT = `You are an AI assistant helping users understand their conversation history.
Answer the user's question using only the conversation excerpts provided.
If the excerpts do not contain the answer, say so plainly.
Be concise and refer to when things were said where it helps.`;

function translationPrompt(targetLanguage: string): string {
  const languageName = SUPPORTED_LANGUAGES[targetLanguage] ?? targetLanguage;
  return `You are a professional translator. Detect the language of the user's message and translate it to ${languageName}.
Preserve tone, emoji and formatting. Do not add explanations.

Respond with a JSON object of exactly this shape:
{"detectedLanguage": "<ISO 639-1 code of the source language>", "translatedText": "<the translation>"}`;
}

export function formatInsightContext(context: InsightContextMessage[]): string {
  return context
    .map((message, i) => `[Message ${i + 1}, ${new Date(message.timestamp).toISOString()}]: ${message.text}`)
    .join('\n\n');
}

/**
 * Strict parse of the translation JSON. Anything else is a hard failure.
 */
export function parseTranslation(content: string): { translatedText: string; detectedLanguage: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new MalformedModelResponseError('Translation response is not valid JSON', content);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new MalformedModelResponseError('Translation response is not a JSON object', content);
  }
  const translatedText: unknown = Reflect.get(parsed, 'translatedText');
  const detectedLanguage: unknown = Reflect.get(parsed, 'detectedLanguage');
  if (typeof translatedText !== 'string' || translatedText.trim() === '' || typeof detectedLanguage !== 'string') {
    throw new MalformedModelResponseError('Translation response is missing required fields', content);
  }
  return { translatedText: translatedText.trim(), detectedLanguage: detectedLanguage.trim().toLowerCase() };
}

/**
 * Chat-completion backed translation and question answering.
 */
export class OpenAITextGenerator implements Translator, InsightGenerator {
  constructor(private readonly client: () => OpenAI = getOpenAI) {}

  async complete(request: CompletionRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client().chat.completions.create({
        model: config.openai.chatModel,
        messages: [
          { role: 'system', content: request.systemPrompt },
          ...request.messages.map(
            (turn): OpenAI.Chat.ChatCompletionMessageParam =>
              turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content }
          ),
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw toModelError(error);
    }

    if (!content || content.trim() === '') {
      throw new MalformedModelResponseError('Empty completion from model');
    }
    return content;
  }

  async translateText(text: string, targetLanguage: string): Promise<{ translatedText: string; detectedLanguage: string }> {
    console.log(`🌐 Translating ${text.length} chars to ${targetLanguage}`);
    const content = await this.complete({
      systemPrompt: translationPrompt(targetLanguage),
      messages: [{ role: 'user', content: text }],
      temperature: config.openai.translationTemperature,
      maxTokens: config.openai.translationMaxTokens,
      json: true,
    });
    return parseTranslation(content);
  }

  async generateInsight(query: string, context: InsightContextMessage[]): Promise<string> {
    const answer = await this.complete({
      systemPrompt: INSIGHT_SYSTEM_PROMPT,
      messages: [
        {
          role: 'user',
          content: `Conversation excerpts:\n\n${formatInsightContext(context)}\n\nQuestion: ${query}`,
        },
      ],
      temperature: config.openai.insightTemperature,
      maxTokens: config.openai.insightMaxTokens,
    });
    return answer.trim();
  }
}
