import app from "./app.js";
import { config, PORT } from "./config/env.js";
import logger from "./utils/logger.js";
import { pruneExpiredSessions } from "./models/session.js";

const SWEEP_INTERVAL = 5 * 60 * 1000; // 5 min
setInterval(() => {
  for (const id of pruneExpiredSessions(Date.now(), config.SESSION_TTL_MS)) {
    logger.info(`🗑️ Sesión ${id} eliminada por inactividad`);
  }
}, SWEEP_INTERVAL);

app.listen(PORT, () => {
  logger.info(`🚀 Joke bot listo en http://localhost:${PORT} (modelo ${config.LLM_MODEL})`);
  if (!config.OPENAI_API_KEY) {
    logger.warn("⚠️ OPENAI_API_KEY no definido: cada sesión deberá enviar su propia clave");
  }
});
