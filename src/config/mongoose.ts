import mongoose from "mongoose";
import { logger } from "../utils/logger";

export async function connectToDatabase(uri: string): Promise<void> {
  mongoose.set("strictQuery", true);
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 5_000 });
  logger.success(`MongoDB connected (${mongoose.connection.name})`);
}

export async function disconnectFromDatabase(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}
