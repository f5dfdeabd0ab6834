import OpenAI from 'openai';

/**
 * Build an OpenAI client on demand so that a missing key only fails the
 * operations that need it.
 */
export function getOpenAIClient(apiKey: string | undefined): OpenAI {
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is not set');
  }
  return new OpenAI({ apiKey });
}
