import { createApp } from "./app.js";
import { bootstrapEnv, loadConfig } from "./lib/config.js";

bootstrapEnv();

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`bodyfat API listening on :${config.port}`);
});
