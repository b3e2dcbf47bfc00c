import { loadConfig } from "../../../src/config";
import { createLLMAdapter } from "../../../src/index";
import { logInfo } from "../../../src/lib/log";
import { createApp } from "./app";

const config = loadConfig();
const llm = createLLMAdapter(config);
const app = createApp({ config, llm });

app.listen(config.server.port, () =>
  logInfo("match_gateway_listening", {
    port: config.server.port,
    llm: llm ? config.openai.model : "disabled",
    authDisabled: config.server.authDisabled,
  })
);
