import winston from "winston";

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
      const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
      const trace = stack ? `\n${String(stack)}` : "";
      return `${String(timestamp)} [${level}] ${String(message)}${extra}${trace}`;
    }),
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
