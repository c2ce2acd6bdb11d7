import pino from "pino";
import { createProgram } from "./lib/inspect-command.ts";

const logger = pino({
  name: "sheet-inspect",
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      ignore: "pid,hostname",
      translateTime: "HH:MM:ss",
    },
  },
});

await createProgram(logger).parseAsync(process.argv);
