import { loadConfig } from "./config";
import { logger } from "./logger";
import { SERVER_INFO } from "./server";
import { createApp } from "./transport";

const config = loadConfig();
const app = createApp(config);

app.listen(config.PORT, () => {
	logger.info(`${SERVER_INFO.name} MCP server listening on port`, config.PORT);
});
