import pino from "pino";

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info");

const pinoInstance = pino({
  level,
  base: { service: "estimation-backend" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default pinoInstance;

function errorFields(error: unknown): { err?: Error; detail?: unknown } {
  return error instanceof Error ? { err: error } : { detail: error };
}

export const logger = {
  info(category: string, message: string, data?: unknown) {
    pinoInstance.info({ category, data }, message);
  },
  warn(category: string, message: string, data?: unknown) {
    pinoInstance.warn({ category, data }, message);
  },
  error(category: string, message: string, error?: unknown) {
    pinoInstance.error({ category, ...errorFields(error) }, message);
  },
  debug(category: string, message: string, data?: unknown) {
    pinoInstance.debug({ category, data }, message);
  },

  apiError(method: string, path: string, error: unknown) {
    const errMsg = error instanceof Error ? error.message : String(error);
    pinoInstance.error({ category: "API", ...errorFields(error) }, `${method} ${path}: ${errMsg}`);
  },
};
