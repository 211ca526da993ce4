// src/config/db.ts
import mongoose from "mongoose";
import config from "./config";

/** Connects when MONGODB_URI is set; returns whether a connection is open. */
const connectDB = async (): Promise<boolean> => {
  if (!config.databaseURI) {
    console.log("ℹ️ MONGODB_URI not set, audit log will not be persisted");
    return false;
  }

  try {
    await mongoose.connect(config.databaseURI);
    console.log("✅ MongoDB connected");
    return true;
  } catch (error) {
    console.error("❌ MongoDB connection error:", error);
    process.exit(1);
  }
};

export default connectDB;
