// src/services/GeminiClient.ts
import { GoogleGenerativeAI } from "@google/generative-ai";
import { apiConfig } from "../config";
import { AnalysisClientError, errorMessage } from "../utils/errors";

export interface AnalysisClient {
  generate(prompt: string): Promise<string>;
}

/** The slice of the Gemini model API the client relies on. */
export interface ContentModel {
  generateContent(
    prompt: string
  ): Promise<{ response: { text(): string } }>;
}

export class GeminiClient implements AnalysisClient {
  private model: ContentModel;

  constructor(model?: ContentModel) {
    if (model) {
      this.model = model;
      return;
    }

    if (!apiConfig.gemini.apiKey) {
      throw new Error("GEMINI_API_KEY is not configured");
    }

    const genAI = new GoogleGenerativeAI(apiConfig.gemini.apiKey);
    this.model = genAI.getGenerativeModel(
      {
        model: apiConfig.gemini.model,
        generationConfig: {
          temperature: apiConfig.gemini.temperature,
          maxOutputTokens: apiConfig.gemini.maxOutputTokens,
        },
      },
      { timeout: apiConfig.gemini.timeout }
    );
  }

  async generate(prompt: string): Promise<string> {
    let content: string;

    try {
      const result = await this.model.generateContent(prompt);
      content = result.response.text();
    } catch (error) {
      throw new AnalysisClientError(
        `API error occurred: ${errorMessage(error)}`,
        error
      );
    }

    if (!content) {
      throw new AnalysisClientError("No response content from Gemini");
    }

    return content;
  }
}
