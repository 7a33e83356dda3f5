import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';
import { AppModule } from './app.module';
import { parseServiceArguments } from './config/cli-arguments';
import { validateEnvironment } from './config/environment';
import { resolveLogLevels } from './config/logging';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const environment = validateEnvironment(process.env);
  const config = parseServiceArguments(process.argv);

  const app = await NestFactory.create(AppModule.forRoot(config), {
    logger: resolveLogLevels(environment.LOG_LEVEL),
  });

  // Close the connection pool on SIGTERM/SIGINT
  app.enableShutdownHooks();

  await app.listen(environment.PORT, '0.0.0.0');
  logger.log(
    `Listening on port ${environment.PORT} with kinds: ${config.enabledKinds.join(', ')}`,
  );
}

bootstrap().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander has already printed usage or the error
    process.exit(error.exitCode);
  }
  logger.fatal(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
