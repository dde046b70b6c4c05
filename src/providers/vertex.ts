// Google Vertex AI Provider
// Uses @google-cloud/vertexai for Gemini models; answers come back as text

import { VertexAI } from '@google-cloud/vertexai';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
import { env } from '../env.js';
import { AppError, errorMessage } from '../utils/errors.js';

export class VertexProvider implements Provider {
  name = 'vertex';
  supportsToolCalling = false;
  private client: VertexAI;

  constructor() {
    if (!env.VERTEX_PROJECT_ID) {
      throw AppError.configuration('VERTEX_PROJECT_ID is required');
    }
    this.client = new VertexAI({
      project: env.VERTEX_PROJECT_ID,
      location: env.VERTEX_LOCATION || 'us-central1',
    });
  }

  private formatMessages(messages: ProviderMessage[]): Array<{ role: string; parts: Array<{ text: string }> }> {
    // Vertex AI uses 'user' and 'model' roles (not 'assistant')
    return messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? 'model' : m.role,
        parts: [{ text: m.content }],
      }));
  }

  private getSystemInstruction(messages: ProviderMessage[]): string | undefined {
    const systemMsg = messages.find(m => m.role === 'system');
    return systemMsg?.content;
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const model = this.client.getGenerativeModel({
      model: options.model,
      systemInstruction: this.getSystemInstruction(messages),
      generationConfig: {
        maxOutputTokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0,
      },
    });

    let result;
    try {
      result = await model.generateContent({
        contents: this.formatMessages(messages),
      });
    } catch (error) {
      throw AppError.externalCall(`Vertex AI error: ${errorMessage(error)}`);
    }

    const response = result.response;
    const content = response.candidates?.[0]?.content?.parts?.[0]?.text || '';

    const usageMetadata = response.usageMetadata;
    const promptTokens = usageMetadata?.promptTokenCount || 0;
    const completionTokens = usageMetadata?.candidatesTokenCount || 0;

    return {
      content,
      toolCalls: [],
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
    };
  }
}
