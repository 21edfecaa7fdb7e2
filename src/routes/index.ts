// src/routes/index.ts
import express from "express";
import type { AnalysisController } from "../controllers/AnalysisController";
import type { ChatController } from "../controllers/ChatController";
import { uploadMiddleware } from "../middleware/uploadMiddleware";
import { validationMiddleware } from "../middleware/validationMiddleware";

export function createRoutes(
  analysisController: AnalysisController,
  chatController: ChatController
): express.Router {
  const router = express.Router();

  // =====================================================
  // BATCH ANALYSIS
  // =====================================================

  // Upload resumes and start a batch run
  router.post(
    "/analyze",
    uploadMiddleware.array("resumes"),
    validationMiddleware.validateFiles,
    validationMiddleware.validateBatchOverrides,
    analysisController.analyzeResumes
  );

  // Progress monitoring
  router.get(
    "/batch/:batchId/progress",
    validationMiddleware.validateBatchId,
    analysisController.getBatchProgress
  );

  // Results and rankings (available once the batch has stopped)
  router.get(
    "/batch/:batchId/results",
    validationMiddleware.validateBatchId,
    analysisController.getResults
  );

  router.get(
    "/batch/:batchId/top",
    validationMiddleware.validateBatchId,
    validationMiddleware.validateRanking,
    analysisController.getTopCandidates
  );

  // Batch control
  router.post(
    "/batch/:batchId/cancel",
    validationMiddleware.validateBatchId,
    analysisController.cancelProcessing
  );

  router.delete(
    "/batch/:batchId",
    validationMiddleware.validateBatchId,
    analysisController.deleteBatch
  );

  // Download results
  router.get(
    "/batch/:batchId/download/:type",
    validationMiddleware.validateBatchId,
    validationMiddleware.validateDownloadType,
    analysisController.downloadResults
  );

  router.get("/batches", analysisController.getAllBatches);
  router.get("/config", analysisController.getConfiguration);

  // =====================================================
  // CHAT
  // =====================================================

  router.post("/chat", validationMiddleware.validateChat, chatController.askQuestion);
  router.get("/chat/samples", chatController.getSampleQuestions);

  // Load a previously exported results JSON as chat context
  router.post(
    "/chat/context",
    uploadMiddleware.single("context"),
    validationMiddleware.validateChatContext,
    chatController.loadContext
  );

  router.get("/chat/:batchId/history", chatController.getHistory);
  router.delete("/chat/:batchId/history", chatController.clearHistory);

  return router;
}
