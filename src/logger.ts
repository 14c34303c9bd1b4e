import pino from "pino";

import { LOG_LEVEL } from "./config.js";

export const logger = pino({
  level: LOG_LEVEL,
  base: { service: "beanwire", pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});
