// src/controllers/ChatController.ts
import type { Request, Response } from "express";
import path from "path";
import type { BatchJobService } from "../services/BatchJobService";
import type { ChatService } from "../services/ChatService";
import { SAMPLE_QUESTIONS } from "../services/prompts";
import type { AnalysisOutcome } from "../types";
import { errorMessage } from "../utils/errors";
import { cleanupFile, readUpload } from "../utils/uploads";

export const GENERAL_CONVERSATION = "general";

/** A batch id wins; otherwise the caller's own conversation id, else "general". */
export function conversationKeyFor(body: {
  batchId?: unknown;
  conversationId?: unknown;
}): string {
  if (typeof body.batchId === "string") return body.batchId;
  if (typeof body.conversationId === "string" && body.conversationId.trim()) {
    return body.conversationId.trim();
  }
  return GENERAL_CONVERSATION;
}

export class ChatController {
  constructor(private chat: ChatService, private jobs: BatchJobService) {}

  askQuestion = async (req: Request, res: Response): Promise<void> => {
    const { question, batchId } = req.body;
    const conversationKey = conversationKeyFor(req.body);

    let outcomes: AnalysisOutcome[] | undefined;
    if (typeof batchId === "string") {
      if (!this.jobs.getJob(batchId)) {
        res.status(404).json({ success: false, error: "Batch job not found" });
        return;
      }
      outcomes = this.jobs.getOutcomes(batchId) ?? undefined;
    }

    try {
      const exchange = await this.chat.ask(
        conversationKey,
        String(question),
        outcomes
      );
      res.status(200).json({
        success: true,
        data: {
          ...exchange,
          conversationId: conversationKey,
          usedResults: outcomes ? outcomes.length : 0,
          usedLoadedContext:
            !outcomes?.length && this.chat.getContext(conversationKey) !== null,
        },
      });
    } catch (error) {
      console.error("Failed to generate response:", error);
      res.status(502).json({
        success: false,
        error: `Failed to generate response: ${errorMessage(error)}`,
      });
    }
  };

  loadContext = (req: Request, res: Response): void => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ success: false, error: "No context file uploaded" });
      return;
    }

    if (path.extname(file.originalname).toLowerCase() !== ".json") {
      cleanupFile(file.path);
      res.status(400).json({
        success: false,
        error: "Context must be a JSON analysis export",
      });
      return;
    }

    const conversationKey = conversationKeyFor(req.body);

    try {
      const loaded = this.chat.loadContext(
        conversationKey,
        readUpload(file).toString("utf8")
      );
      console.log(`📎 Loaded chat context for ${conversationKey} from ${file.originalname}`);
      res.status(200).json({
        success: true,
        data: { conversationId: conversationKey, ...loaded },
      });
    } catch (error) {
      res.status(400).json({ success: false, error: errorMessage(error) });
    }
  };

  getHistory = (req: Request, res: Response): void => {
    const conversationKey = req.params.batchId;
    res.status(200).json({
      success: true,
      data: {
        history: this.chat.getHistory(conversationKey),
        context: this.chat.getContext(conversationKey),
      },
    });
  };

  clearHistory = (req: Request, res: Response): void => {
    this.chat.clear(req.params.batchId);
    res.status(200).json({ success: true, data: { message: "Chat cleared" } });
  };

  getSampleQuestions = (_req: Request, res: Response): void => {
    res.status(200).json({ success: true, data: { questions: SAMPLE_QUESTIONS } });
  };
}
