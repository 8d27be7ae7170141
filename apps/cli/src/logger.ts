import pino from "pino";
import pretty from "pino-pretty";
import { validateEnv } from "@shared/env";

const env = validateEnv(process.env);

// stdout belongs to the menu; log records always go to stderr
export const logger =
  env.NODE_ENV === "development"
    ? pino(
        { level: env.LOG_LEVEL },
        pretty({
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: 2,
          sync: true,
        }),
      )
    : pino({ level: env.LOG_LEVEL }, pino.destination({ fd: 2, sync: true }));

export { env };
