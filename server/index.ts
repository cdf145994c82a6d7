import express, { type Request, type Response, type NextFunction } from "express";
import path from "path";
import { fileURLToPath } from "url";
import { registerRoutes } from "./routes";
import { addSecurityHeaders, validateOrigin } from "./middleware/security";
import { errorMiddleware } from "./utils/errorHandler";
import { getPort } from "./config/constants";

function log(message: string) {
  const time = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${time} [express] ${message}`);
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestPath = req.path;

  res.on("finish", () => {
    if (requestPath.startsWith("/api")) {
      log(`${req.method} ${requestPath} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });

  next();
}

const app = express();

app.use(addSecurityHeaders);
app.use(express.json({ limit: "5mb" }));
app.use(express.urlencoded({ extended: false }));
app.use(requestLogger);
app.use(validateOrigin);

const server = registerRoutes(app);

if (process.env.NODE_ENV === "production") {
  const publicDir = fileURLToPath(new URL("../dist/public", import.meta.url));
  app.use(express.static(publicDir));
  app.get("*", (_req, res) => {
    res.sendFile(path.join(publicDir, "index.html"));
  });
}

app.use(errorMiddleware);

const port = getPort();
server.listen(port, "0.0.0.0", () => {
  log(`serving on port ${port}`);
});
