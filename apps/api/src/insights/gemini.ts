import { GoogleGenAI } from '@google/genai';

export type ModelRequest = {
  model: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
};

/** The only boundary to a language model: resolves with text or rejects. */
export type ModelCall = (request: ModelRequest) => Promise<string>;

const SYSTEM_INSTRUCTION = 'You are a business analyst. Answer with plain text grounded in the numbers provided.';

export const createGeminiModelCall = (apiKey: string, timeoutMs?: number): ModelCall => {
  const ai = new GoogleGenAI({ apiKey, httpOptions: timeoutMs ? { timeout: timeoutMs } : undefined });

  return async ({ model, prompt, temperature, maxOutputTokens }) => {
    const response = await ai.models.generateContent({
      model,
      contents: prompt,
      config: {
        systemInstruction: SYSTEM_INSTRUCTION,
        temperature,
        maxOutputTokens
      }
    });
    return response.text || '';
  };
};
