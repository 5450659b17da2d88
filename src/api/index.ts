import dotenv from "dotenv";

import { loadConfig } from "../config";
import { CatalogueStore } from "../stores/catalogueStore";
import { createApp } from "./app";

dotenv.config();

const config = loadConfig();
const store = CatalogueStore.fromFile(config.catalogueFile);

try {
  const stats = store.reload().stats();
  console.log(`Catalogue loaded: ${stats.courses} courses, ${stats.sections} sections`);
} catch (error) {
  // Keep serving; scheduling answers 503 until a reload succeeds
  console.error("Error loading catalogue:", error);
}
store.startAutoReload(config.catalogueReloadMinutes);

const app = createApp(store, config);

// Start server
app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

export default app;
