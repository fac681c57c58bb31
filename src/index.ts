import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { LocalStorage } from "./storage/local.js";
import { createApp } from "./app.js";

async function main() {
  // 1. Load config
  const cfg = loadConfig();
  console.log(
    `Config loaded (port: ${cfg.server.port}, save path: ${cfg.storage.save_path}, ` +
      `file limit: ${cfg.storage.file_limit}, size limit: ${cfg.storage.single_file_size_limit})`,
  );

  // 2. Prepare the save directory
  const storage = new LocalStorage(cfg.storage.save_path);
  await storage.init();
  console.log(`Save path ready: ${cfg.storage.save_path}`);

  // 3. Build the Express app
  const app = createApp(cfg, storage);

  // 4. Start server
  const port = cfg.server.port;
  app.listen(port, () => {
    console.log(`Starting server on :${port}`);
  });
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
