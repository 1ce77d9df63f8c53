import { createApp } from "./api/app.js";
import { loadConfig } from "./config.js";
import { JsonFileInventoryStore } from "./services/inventoryStore.js";

const config = loadConfig();
const store = JsonFileInventoryStore.open(config.dataFile);

const app = createApp({ store, config });

app.listen(config.port, () => {
  console.log(`KiCad library service running on port ${config.port}`);
});
