import { fileURLToPath } from "node:url";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const isEntrypoint = process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1];

if (isEntrypoint) {
  const { port, host } = loadConfig();
  const app = await createApp();
  app.listen({ port, host }).catch((err) => {
    app.log.error(err);
    process.exit(1);
  });
}

export { createApp };
