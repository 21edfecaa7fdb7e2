// src/index.ts
import fs from "fs";
import path from "path";
import { apiConfig, config, serverConfig, validateConfig } from "./config";
import { createApp } from "./app";
import { BatchJobService } from "./services/BatchJobService";
import { BatchOrchestrator } from "./services/BatchOrchestrator";
import { ChatService } from "./services/ChatService";
import { ExportService } from "./services/ExportService";
import { GeminiClient } from "./services/GeminiClient";
import { ResumeAnalyzer } from "./services/ResumeAnalyzer";
import { DocumentTextExtractor } from "./services/TextExtractor";

// Missing credentials stop the process before any batch can start
validateConfig();

const client = new GeminiClient();
const analyzer = new ResumeAnalyzer(new DocumentTextExtractor(), client);
const jobs = new BatchJobService(new BatchOrchestrator(analyzer));
const exporter = new ExportService(serverConfig.outputDir);
const chat = new ChatService(client);

const app = createApp({ jobs, exporter, chat });

// Output and in-memory housekeeping share one retention period
const housekeeping = () => {
  exporter.cleanupOldFiles(serverConfig.outputMaxAgeHours);
  for (const batchId of jobs.evictFinished(serverConfig.outputMaxAgeHours)) {
    chat.clear(batchId);
  }
};
housekeeping();
const cleanupTimer = setInterval(housekeeping, 60 * 60 * 1000);
cleanupTimer.unref();

// Graceful shutdown handling
const gracefulShutdown = () => {
  console.log("\n📴 Received shutdown signal, cleaning up...");

  try {
    if (fs.existsSync(serverConfig.uploadDir)) {
      for (const file of fs.readdirSync(serverConfig.uploadDir)) {
        const filePath = path.join(serverConfig.uploadDir, file);
        try {
          if (fs.statSync(filePath).isFile()) {
            fs.unlinkSync(filePath);
          }
        } catch (error) {
          console.warn(`⚠️ Could not cleanup ${file}:`, error);
        }
      }
      console.log("🧹 Cleaned up temporary uploads");
    }
  } catch (error) {
    console.warn("⚠️ Error during cleanup:", error);
  }

  process.exit(0);
};

process.on("SIGTERM", gracefulShutdown);
process.on("SIGINT", gracefulShutdown);

const server = app.listen(serverConfig.port, () => {
  console.log("\n🚀 RESUME BATCH ANALYZER");
  console.log("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━");
  console.log(`📡 Server running on: http://localhost:${serverConfig.port}`);
  console.log(`🔧 API endpoints: http://localhost:${serverConfig.port}/api`);
  console.log(`💾 Output directory: ${path.resolve(serverConfig.outputDir)}`);
  console.log(`📤 Upload directory: ${path.resolve(serverConfig.uploadDir)}`);
  console.log(`🤖 Model: ${apiConfig.gemini.model}`);
  console.log(`📄 Formats: ${config.files.supportedExtensions.join(", ")}`);
  console.log("━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n");
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.code === "EADDRINUSE") {
    console.error(`❌ Port ${serverConfig.port} is already in use`);
  } else {
    console.error("❌ Server error:", error);
  }
  process.exit(1);
});

export default app;
