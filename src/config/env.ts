import { config } from "dotenv";

// .env in production, .env.local everywhere else
const envFile = process.env.NODE_ENV === "production" ? ".env" : ".env.local";
config({ path: envFile });
