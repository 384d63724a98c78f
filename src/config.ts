import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

dotenv.config();

const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

export const config = {
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
  },
  db: {
    path: process.env.DB_PATH ?? path.join(rootDir, "data", "evaluations.db"),
  },
  log: {
    level: process.env.LOG_LEVEL ?? "info",
    dir: process.env.LOG_DIR ?? path.join(rootDir, "data", "logs"),
  },
};
