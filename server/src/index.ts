import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";
import { detectThumbnailer } from "./services/thumbnails.js";

async function main() {
  const config = loadConfig();
  const thumbnailer = await detectThumbnailer(config.ffmpegPath);
  const app = await buildApp(config, { thumbnailer });

  app.log.info(
    {
      contentDir: config.contentDir,
      messagesDir: config.messagesDir,
      uploadsDir: config.uploadsDir,
      thumbnails: thumbnailer ? thumbnailer.name : "unavailable",
      emailRelay: Boolean(config.smtp && config.adminEmail),
    },
    "Storage and capabilities",
  );
  if (!config.adminToken) {
    app.log.warn("ADMIN_TOKEN is not set; page and project creation is disabled");
  }

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
