/**
 * Import a KiCad netlist into the inventory data file.
 *
 * Run:
 *   npx tsx scripts/importNetlist.ts path/to/board.xml [username]
 */
import fs from "fs";
import path from "path";
import { loadConfig } from "../config.js";
import { JsonFileInventoryStore } from "../services/inventoryStore.js";
import { importNetlist } from "../services/metadataImportService.js";
import { getSettings } from "../services/settingsService.js";

async function main() {
  const [file, username = "cli"] = process.argv.slice(2);
  if (!file) {
    throw new Error("Usage: importNetlist <netlist.xml> [username]");
  }

  const config = loadConfig();
  const store = JsonFileInventoryStore.open(config.dataFile);
  const settings = await getSettings(store);

  const summary = await importNetlist(store, settings, {
    content: fs.readFileSync(file),
    contentType: "application/xml",
    fileName: path.basename(file),
    username
  });

  console.dir(summary, { depth: null });
}

main().catch((err) => {
  console.error("❌ NETLIST IMPORT FAILED");
  console.error(err);
  process.exit(1);
});
