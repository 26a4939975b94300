import winston, { format } from "winston";
import { LOG_LEVEL, NODE_ENV } from "../config/env";

const logger = winston.createLogger({
  level: LOG_LEVEL,
  silent: NODE_ENV === "test",
  format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
  defaultMeta: { service: "inventory_service" },
  transports: [
    new winston.transports.Console(),
  ],
});

export default logger;
