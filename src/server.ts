import { createApp } from "./app";
import { MemoryResultCache } from "./cache/resultCache";
import { loadConfig } from "./config";
import { createLogger, setLogLevel } from "./lib/logger";
import { ResumeParserService } from "./parsers/resumeParser";

const config = loadConfig();
setLogLevel(config.logLevel);

const logger = createLogger("server");

const parser = new ResumeParserService({
    cache: new MemoryResultCache(config.cacheTtlSeconds),
});

const app = createApp({ config, parser });

// Start server
const server = app.listen(config.port, () => {
    logger.info(`CV parsing server running on http://localhost:${config.port}`);
    logger.info("Endpoint: POST /parse-cv");
    logger.info("Endpoint: POST /parse-text");
});

// Graceful shutdown
process.on("SIGTERM", () => {
    logger.info("SIGTERM received, shutting down gracefully");
    server.close(() => process.exit(0));
});
