import { createServer } from "http";
import path from "path";
import { fileURLToPath } from "url";
import { createApp } from "./app";
import { loadEnvFiles, loadServerConfig } from "./config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

async function startServer() {
  // Serve static files from dist/public in production
  const staticPath =
    process.env.NODE_ENV === "production"
      ? path.resolve(__dirname, "public")
      : path.resolve(__dirname, "..", "dist", "public");

  const config = loadServerConfig(loadEnvFiles(process.cwd()), staticPath);
  const server = createServer(createApp(config));

  server.listen(config.port, () => {
    console.info(`[server] Running on http://localhost:${config.port}/`);
  });
}

startServer().catch((error: unknown) => {
  console.error("[server] Failed to start:", error);
  process.exitCode = 1;
});
