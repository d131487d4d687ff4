#!/usr/bin/env tsx
import "dotenv/config";

import { runCommand } from "./commands.ts";
import { EnvError, formatEnvError, getEnv } from "./lib/env.ts";
import { logger } from "./lib/logger.ts";

async function main(argv: string[]): Promise<number> {
  let env;
  try {
    env = getEnv();
  } catch (error) {
    if (error instanceof EnvError) {
      console.error(formatEnvError(error));
      return 1;
    }
    throw error;
  }

  logger.level = env.LOG_LEVEL;
  return runCommand(argv, { env });
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ err: error }, "Unhandled error");
    process.exitCode = 1;
  }
);
