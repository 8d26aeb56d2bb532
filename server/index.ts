// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
import dotenv from "dotenv";
dotenv.config();

import { hostname } from "node:os";
import { createServer } from "node:http";
import express from "express";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { log, logError } from "./log";
import { errorHandler, registerRoutes } from "./routes";
import { ProvisioningService } from "./services/provisioningService";
import { DatabaseAuditSink, DatabaseStateStore } from "./storage";
import { HttpVendorApi, ResilientVendorApi } from "./vendor";

const config = loadConfig();
if (!config.databaseUrl) {
  throw new Error("DATABASE_URL must be set");
}

const { db, pool } = createDatabase(config.databaseUrl);

const vendor = new ResilientVendorApi(
  new HttpVendorApi({
    host: config.vendor.host,
    token: config.vendor.token,
    requestTimeoutMs: config.vendor.timeoutMs,
  }),
  {
    timeoutMs: config.vendor.timeoutMs,
    maxAttempts: config.vendor.maxAttempts,
    backoffMs: config.vendor.backoffMs,
  },
);

const service = new ProvisioningService({
  store: new DatabaseStateStore(db),
  vendor,
  audit: new DatabaseAuditSink(db),
  config,
  ownerId: `${hostname()}:${process.pid}`,
});

const app = express();
const httpServer = createServer(app);

app.use(express.json());

app.use((req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
});

registerRoutes(app, service);
app.use(errorHandler);

httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port}`);
});

function shutdown(signal: string): void {
  log(`${signal} received, closing`);
  httpServer.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        logError("express", "Failed to close database pool", err);
        process.exit(1);
      },
    );
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
