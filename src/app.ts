// src/app.ts
import express from "express";
import cors from "cors";
import compression from "compression";
import helmet from "helmet";
import { serverConfig } from "./config";
import { AnalysisController } from "./controllers/AnalysisController";
import { ChatController } from "./controllers/ChatController";
import { errorMiddleware } from "./middleware/errorMiddleware";
import { rateLimitMiddleware } from "./middleware/rateLimitMiddleware";
import { createRoutes } from "./routes";
import type { BatchJobService } from "./services/BatchJobService";
import type { ChatService } from "./services/ChatService";
import type { ExportService } from "./services/ExportService";

export interface AppServices {
  jobs: BatchJobService;
  exporter: ExportService;
  chat: ChatService;
}

export function createApp(services: AppServices): express.Express {
  const app = express();

  // Security and performance middleware
  app.use(helmet());
  app.use(compression());

  app.use(
    cors({
      origin: serverConfig.corsOrigins.includes("*")
        ? "*"
        : serverConfig.corsOrigins,
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  const analysisController = new AnalysisController(
    services.jobs,
    services.exporter
  );
  const chatController = new ChatController(services.chat, services.jobs);

  app.use("/api", rateLimitMiddleware, createRoutes(analysisController, chatController));

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memoryUsage: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        heapTotal: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
      },
    });
  });

  app.use(errorMiddleware);

  return app;
}
