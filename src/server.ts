import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { logEvent } from "./utils/logEvent";

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, config.host, () => {
  const baseUrl = `http://${config.host}:${config.port}`;
  logEvent("server_started", {
    port: config.port,
    host: config.host,
    health_url: `${baseUrl}/health`,
    index_url: `${baseUrl}/`,
    resume_url: `${baseUrl}/resume.pdf`,
    resources_url: `${baseUrl}/resources/:filename`,
  });
});
