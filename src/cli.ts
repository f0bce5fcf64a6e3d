#!/usr/bin/env node
/**
 * repairwatch CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import type { ShutdownEvents } from './runtime/ports/shutdown-events.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { LogContext } from './core/logging/index.js';
import { LOCATION_POINTER_FILE } from './core/logging/index.js';
import type { WatchdogService } from './application/services/watchdog-service.js';
import { PatternClassifier } from './application/services/pattern-classifier.js';
import { DEFAULT_METADATA_FILE, loadErrorKindMetadata } from './infrastructure/metadata/error-kind-metadata.js';
import { loadConfig } from './config/app-config.js';
import { currentHost } from './config/default-paths.js';
import { errorCode, formatAppError } from './errors/formatter.js';
import type { RuntimeMode } from './runtime/runtime-mode.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeRunCommand,
  executeScanCommand,
  executeKindsCommand,
  executeWhereCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONTAINER BOUNDARY
// ═══════════════════════════════════════════════════════════════════════════

/** Initializes DI or exits with the formatted startup error. */
async function requireContainer(runtimeMode: RuntimeMode): Promise<ProcessTerminator> {
  const initialized = await initializeContainer({ runtimeMode });
  if (initialized.isErr()) {
    interpretCliResultWithoutDI(failure(formatAppError(initialized.error)));
  }
  return container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
}

async function readPointer(directory: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(path.join(directory, LOCATION_POINTER_FILE), 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT' || errorCode(error) === 'ENOTDIR') return null;
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('repairwatch')
  .description('Watches application logs for known failure signatures and runs the matching repair')
  .version('0.4.0');

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITHOUT DI (pure filesystem operations)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('scan <file>')
  .description('Classify every line of a log file once (no repairs)')
  .action(async (filePath: string) => {
    const classifier = new PatternClassifier();
    const result = await executeScanCommand(filePath, {
      readFile: (p) => fs.promises.readFile(p, 'utf-8'),
      classifyText: (raw) => classifier.classifyText(raw),
    });

    interpretCliResultWithoutDI(result);
  });

program
  .command('kinds')
  .description('List the error kinds the watchdog recognizes and their repairs')
  .action(async () => {
    const config = loadConfig({ env: process.env, host: currentHost() });
    if (config.isErr()) {
      interpretCliResultWithoutDI(failure(formatAppError(config.error)));
      return;
    }
    const metadataFile = config.value.metadataFile ?? DEFAULT_METADATA_FILE;

    const result = await executeKindsCommand({
      loadCatalog: () => loadErrorKindMetadata(metadataFile),
    });

    interpretCliResultWithoutDI(result);
  });

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS WITH DI (need config or services)
// ═══════════════════════════════════════════════════════════════════════════

program
  .command('run')
  .description('Run the watchdog in the foreground until SIGINT, SIGTERM or SIGHUP')
  .action(async () => {
    const terminator = await requireContainer({ kind: 'service' });
    const logContext = container.resolve<LogContext>(DI.Logging.Context);

    const result = await executeRunCommand({
      watchdog: container.resolve<WatchdogService>(DI.Services.Watchdog),
      signals: container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
      shutdownEvents: container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents),
      logger: logContext.create('cli'),
      closeLogs: () => logContext.close(),
    });

    interpretCliResult(result, terminator);
    // Signal listeners keep the event loop alive; the run is over either way.
    terminator.terminate({ kind: 'success' });
  });

program
  .command('where')
  .description('Show where the watchdog is writing its own logs')
  .action(async () => {
    const terminator = await requireContainer({ kind: 'cli' });
    const config = container.resolve<ValidatedConfig>(DI.Config.App);

    const result = await executeWhereCommand({
      candidates: config.logging.candidates,
      readPointer,
    });

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  console.error('[repairwatch] Fatal:', error);
  process.exit(1);
});
