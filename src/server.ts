import app from "./app.js";
import logger from "./utils/logger.js";
import { env, port } from "./config/config.js";

app.listen(port, () => {
  logger.info(`Server running on http://localhost:${port} (${env})`);
});
