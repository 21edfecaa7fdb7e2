// src/services/ChatService.ts - Questions over analysed resumes
import type { AnalysisOutcome, ChatExchange } from "../types";
import { errorMessage } from "../utils/errors";
import type { AnalysisClient } from "./GeminiClient";
import { buildChatPrompt } from "./prompts";
import { toJsonDocument } from "./ResultAggregator";

export interface LoadedContext {
  loadedAt: Date;
  /** Entries under `results` for an exported document, otherwise 0. */
  resultCount: number;
}

interface StoredContext extends LoadedContext {
  text: string;
}

function countResults(value: unknown): number {
  if (typeof value !== "object" || value === null || !("results" in value)) {
    return 0;
  }
  return Array.isArray(value.results) ? value.results.length : 0;
}

export class ChatService {
  private histories = new Map<string, ChatExchange[]>();
  private contexts = new Map<string, StoredContext>();

  constructor(
    private client: AnalysisClient,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Keeps a previously exported results document as the context for one
   * conversation. Any JSON object or array is accepted.
   */
  loadContext(conversationKey: string, rawJson: string): LoadedContext {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawJson);
    } catch (error) {
      throw new Error(`Failed to load analysis context: ${errorMessage(error)}`);
    }

    if (typeof parsed !== "object" || parsed === null) {
      throw new Error(
        "Failed to load analysis context: Expected a JSON object or array"
      );
    }

    const stored: StoredContext = {
      text: JSON.stringify(parsed, null, 2),
      loadedAt: this.now(),
      resultCount: countResults(parsed),
    };
    this.contexts.set(conversationKey, stored);

    return { loadedAt: stored.loadedAt, resultCount: stored.resultCount };
  }

  getContext(conversationKey: string): LoadedContext | null {
    const stored = this.contexts.get(conversationKey);
    return stored
      ? { loadedAt: stored.loadedAt, resultCount: stored.resultCount }
      : null;
  }

  /** Job outcomes win over a loaded document when both are present. */
  async ask(
    conversationKey: string,
    question: string,
    outcomes?: AnalysisOutcome[]
  ): Promise<ChatExchange> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new Error("Please enter a question.");
    }

    const context =
      outcomes && outcomes.length > 0
        ? JSON.stringify(toJsonDocument(outcomes, this.now()), null, 2)
        : this.contexts.get(conversationKey)?.text;

    const answer = await this.client.generate(buildChatPrompt(trimmed, context));

    const exchange: ChatExchange = {
      question: trimmed,
      answer,
      askedAt: this.now(),
    };

    const history = this.histories.get(conversationKey) ?? [];
    history.push(exchange);
    this.histories.set(conversationKey, history);

    return exchange;
  }

  getHistory(conversationKey: string): ChatExchange[] {
    return [...(this.histories.get(conversationKey) ?? [])];
  }

  /** Drops the history and any loaded context of a conversation. */
  clear(conversationKey: string): boolean {
    const hadHistory = this.histories.delete(conversationKey);
    const hadContext = this.contexts.delete(conversationKey);
    return hadHistory || hadContext;
  }
}
