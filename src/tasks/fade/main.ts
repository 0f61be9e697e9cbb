#!/usr/bin/env node
import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { FadeCommand } from "../../cli/cli-args";
import { runFadeCli } from "../../cli/fade-cli";
import { FadeCommandService } from "../../cli/fade-command.service";
import { StderrLogger } from "../../cli/stderr-logger";
import { fadeConfig, FadeConfig } from "../../config/fade.config";
import { FadeResult } from "../../fade/types";
import { AppModule } from "./app.module";

/**
 * Boots the application context only once the arguments are known to be valid
 */
async function executeFade(command: FadeCommand): Promise<FadeResult> {
  const logger = new StderrLogger();
  logger.setLogLevels(["error", "warn"]);

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger,
    abortOnError: false,
  });
  try {
    const config = app.get<FadeConfig>(fadeConfig.KEY);
    logger.setLogLevels(config.logLevels);
    return await app.get(FadeCommandService).execute(command);
  } finally {
    await app.close();
  }
}

async function bootstrap(): Promise<void> {
  process.exitCode = await runFadeCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    execute: executeFade,
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
