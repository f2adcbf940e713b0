import { configure, getConsoleSink } from "@logtape/logtape";

import { isProduction } from "@/shared/utils/env";

/**
 * Configure LogTape for structured logging across the application.
 */
export const initializeLogging = async () => {
  const lowestLevel = isProduction() ? "info" : "debug";

  await configure({
    reset: true,
    sinks: {
      console: getConsoleSink(),
    },
    loggers: [
      {
        category: ["hono"],
        sinks: ["console"],
        lowestLevel,
      },
      {
        category: ["app"],
        sinks: ["console"],
        lowestLevel,
      },
      {
        category: ["logtape", "meta"],
        sinks: ["console"],
        lowestLevel: "warning",
      },
    ],
  });
};
