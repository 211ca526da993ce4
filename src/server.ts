// src/server.ts
import { createApp } from "./app";
import connectDB from "./config/db";
import config from "./config/config";

const startServer = async () => {
  try {
    // 1. Optional MongoDB for the audit log
    await connectDB();

    const app = createApp();

    const server = app.listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });

    // Large workbooks take a while to parse and export
    server.timeout = 600000; // 10 minutes
    server.keepAliveTimeout = 610000;
    server.headersTimeout = 620000;
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
