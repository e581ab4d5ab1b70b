import pino from "pino";
import pinoHttp from "pino-http";
import { config } from "./config";

const isProduction = config.NODE_ENV === "production";
const isTest = config.NODE_ENV === "test";

function defaultLevel(): string {
  if (isTest) return "silent";
  return isProduction ? "info" : "debug";
}

export const logger = pino({
  level: config.LOG_LEVEL || defaultLevel(),
  transport: isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
  base: {
    service: "certificate-intake",
    env: config.NODE_ENV,
  },
  redact: {
    paths: ["req.headers.authorization", "req.headers.cookie", "*.fileBase64", "*.apiKey"],
    censor: "[REDACTED]",
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const httpLogger = pinoHttp({
  logger,
  genReqId: (req, res) => {
    const header = req.headers["x-correlation-id"];
    const existing = res.getHeader("x-correlation-id");
    if (typeof existing === "string") return existing;
    return typeof header === "string" && header ? header : crypto.randomUUID();
  },
  autoLogging: {
    ignore: (req) => (req.url || "").startsWith("/health"),
  },
  customLogLevel: (_req, res, err) => {
    if (res.statusCode >= 500 || err) return "error";
    if (res.statusCode >= 400) return "warn";
    return "info";
  },
  customSuccessMessage: (req, res) => {
    return `${req.method} ${req.url} ${res.statusCode}`;
  },
  customErrorMessage: (req, res, err) => {
    return `${req.method} ${req.url} ${res.statusCode} - ${err?.message || "Error"}`;
  },
  customProps: (req) => ({
    userAgent: req.headers["user-agent"],
    component: "http",
  }),
});

export const createContextLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

export const extractionLogger = createContextLogger({ component: "extraction" });
export const ingestionLogger = createContextLogger({ component: "ingestion" });
export const submissionLogger = createContextLogger({ component: "submission" });
