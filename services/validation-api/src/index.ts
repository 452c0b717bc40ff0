import { loadConfig } from "@signal-audit/common";
import { createApp } from "./app.js";

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () =>
  console.log(
    `validation-api listening on :${config.port} ` +
    `(tolerance=${config.audit.tolerance}, lot=${config.audit.lotSize}, t+1=${config.audit.settlementStrategy})`
  )
);
