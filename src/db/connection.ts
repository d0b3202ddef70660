import mongoose from "mongoose";
import logger from "../utils/logger.js";

export async function connectToDatabase(url: string): Promise<void> {
  try {
    await mongoose.connect(url, { serverSelectionTimeoutMS: 5000 });
    logger.info({ host: mongoose.connection.host }, "Connected to MongoDB");
  } catch (error) {
    logger.error({ err: error }, "Could not connect to MongoDB");
    throw new Error("Could not connect to MongoDB", { cause: error });
  }
}

export async function disconnectFromDatabase(): Promise<void> {
  try {
    await mongoose.disconnect();
  } catch (error) {
    logger.error({ err: error }, "Could not disconnect from MongoDB");
    throw new Error("Could not disconnect from MongoDB", { cause: error });
  }
}
