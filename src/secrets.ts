/**
 * API keys come from Secret Manager, which Cloud Functions exposes as
 * environment variables for functions declared with `runWith({ secrets })`.
 */

export const SECRET_NAMES = ['OPENAI_API_KEY', 'PINECONE_API_KEY'] as const;

type SecretName = (typeof SECRET_NAMES)[number];

function readSecret(name: SecretName): string {
  const value = process.env[name];
  if (value) {
    return value;
  }
  throw new Error(`❌ ${name} not found! Ensure the secret exists and the function declares it.`);
}

export function getOpenAIKey(): string {
  return readSecret('OPENAI_API_KEY');
}

export function getPineconeKey(): string {
  return readSecret('PINECONE_API_KEY');
}

