#!/usr/bin/env node
/**
 * Command-line entry point: newslookout <config.toml>
 *
 * Exit codes: 0 on success, 1 on configuration errors, 2 on usage errors.
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { loadAppConfig } from '../config/appConfig.js';
import type { AppConfig } from '../config/appConfig.js';
import { CompletionStore } from '../pipeline/CompletionStore.js';
import { PipelineOrchestrator } from '../pipeline/PipelineOrchestrator.js';
import { createDefaultRegistry } from '../pipeline/StageRegistry.js';
import type { StageRegistry } from '../pipeline/StageRegistry.js';
import { ConfigurationError } from '../types/errors.js';
import { applyConfiguredLogLevel, logger } from '../utils/logger.js';
import { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';

export const USAGE = 'Usage: newslookout <config.toml>\n';

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  registry?: StageRegistry;
  stderr?: Pick<NodeJS.WriteStream, 'write'>;
  /** Install SIGINT/SIGTERM handlers for the duration of the run */
  handleSignals?: boolean;
}

function logConfigurationError(error: ConfigurationError): void {
  logger.error({ issues: error.issues }, error.message);
}

export async function main(args: string[], options: CliOptions = {}): Promise<number> {
  const configPath = args[0];
  if (!configPath) {
    (options.stderr ?? process.stderr).write(USAGE);
    return 2;
  }

  let config: AppConfig;
  try {
    config = loadAppConfig(configPath, options.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logConfigurationError(error);
      return 1;
    }
    throw error;
  }
  applyConfiguredLogLevel(config.logLevel);

  const completionStore = new CompletionStore(config.completedUrlsDatafile);
  const shutdown = new ShutdownCoordinator();
  shutdown.register('completion-store', () => completionStore.close());
  const removeSignalHandlers = options.handleSignals ? shutdown.installSignalHandlers() : () => undefined;

  try {
    const orchestrator = new PipelineOrchestrator(config, {
      registry: options.registry ?? createDefaultRegistry(),
      completionStore,
    });
    const result = await orchestrator.run();
    logger.info(
      { processed: result.processed, committed: result.committed, failedStages: result.failedStages },
      `Processed ${result.processed} documents`
    );
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logConfigurationError(error);
      return 1;
    }
    throw error;
  } finally {
    removeSignalHandlers();
    completionStore.close();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2), { handleSignals: true }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error }, 'Unexpected error');
      process.exitCode = 1;
    }
  );
}
