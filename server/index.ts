import express, { type Request, Response, NextFunction } from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { getConfig } from "./config";
import { getServiceRegistry, preWarmServices } from "./service-registry";
import { AppError, toAppError } from "./error-handling";

const config = getConfig();
const services = getServiceRegistry();

// Build client handles now so the first scan doesn't pay for it
preWarmServices(services);

const app = express();
const httpServer = createServer(app);

// Photos arrive as base64 JSON
app.use(express.json({ limit: "20mb" }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

registerRoutes(httpServer, app, services);

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  // body-parser errors carry their own 4xx status
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status < 500) {
    return res.status(err.status).json({ message: err.message });
  }

  const appError = err instanceof AppError ? err : toAppError(err);
  if (appError.getStatusCode() >= 500) {
    console.error(`[Server] ${appError.code}:`, appError.originalError ?? appError);
  } else {
    log(`${appError.code}: ${appError.message}`, "pipeline");
  }

  // Client already gone
  if (res.headersSent) return;
  res.status(appError.getStatusCode()).json(appError.toJSON());
});

httpServer.listen(config.PORT, "0.0.0.0", () => {
  log(`serving on port ${config.PORT}`);
});
