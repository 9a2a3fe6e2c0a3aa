import fs from "fs/promises";
import path from "path";
import { config } from "./config";
import {
  buildManifest,
  collectStadiums,
  findStadiumFiles,
  renderStadiumMarkdown,
} from "./manifest/stadiums";
import { JsonStorage } from "./storage/json";
import { logger } from "./utils/logger";

async function main() {
  const storage = new JsonStorage();
  const payload = await storage.loadSchedule();

  const entries = await findStadiumFiles(
    collectStadiums(payload.games),
    config.stadiums.dir
  );
  const manifest = buildManifest(
    entries,
    storage.scheduleFile.split(path.sep).join("/"),
    config.stadiums.dir
  );

  await fs.mkdir(path.dirname(config.stadiums.manifestFile), { recursive: true });
  await fs.writeFile(
    config.stadiums.manifestFile,
    JSON.stringify(manifest, null, 2) + "\n",
    "utf-8"
  );
  logger.info(
    `Wrote ${config.stadiums.manifestFile} (found=${manifest.found.length} missing=${manifest.missing.length})`
  );

  await fs.writeFile(config.stadiums.markdownFile, renderStadiumMarkdown(manifest), "utf-8");
  logger.info(`Wrote ${config.stadiums.markdownFile}`);
}

main().catch((error) => {
  logger.error("Failed to build stadium manifest:", error);
  process.exit(1);
});
