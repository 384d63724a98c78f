import pino, { type Logger } from "pino";
import path from "node:path";
import fs from "node:fs";
import type { Request, Response, NextFunction } from "express";
import { config } from "./config.js";

// Rotate log file daily — filename: scoring-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(config.log.dir, `scoring-${date}.log`);
}

function isTestRun(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

function createLogger(): Logger {
  if (isTestRun()) {
    return pino({ level: "silent", base: { service: "answer-scoring" } });
  }

  if (!fs.existsSync(config.log.dir)) fs.mkdirSync(config.log.dir, { recursive: true });

  // Multi-destination: stderr (human-readable) + file (JSON for parsing)
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level: config.log.level,
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug",
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level — targets filter individually
      base: { service: "answer-scoring" },
    },
    transport,
  );
}

export const logger = createLogger();

// Typed child loggers for subsystems
export const logEval = logger.child({ subsystem: "ensemble" });
export const logDispatch = logger.child({ subsystem: "dispatch" });
export const logOracle = logger.child({ subsystem: "oracle" });
export const logGate = logger.child({ subsystem: "gatekeeper" });
export const logRest = logger.child({ subsystem: "rest" });
export const logDb = logger.child({ subsystem: "database" });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30): void {
  if (!fs.existsSync(config.log.dir)) return;
  try {
    const files = fs.readdirSync(config.log.dir).filter((f) => f.startsWith("scoring-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/scoring-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(config.log.dir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
