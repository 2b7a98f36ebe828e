import { loadConfig } from "./config.js";
import { buildServer } from "./server.js";

const config = loadConfig();
const app = await buildServer();

app.listen({ port: config.port, host: config.host })
  .then(() => app.log.info("custody-service listening on :" + config.port))
  .catch((err) => {
    app.log.error(err);
    process.exit(1);
  });
