#!/usr/bin/env node

/**
 * Turntable Render Orchestrator - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { RenderRepository } from './infrastructure/database/repositories/RenderRepository.js';
import { JobRegistry } from './infrastructure/registry/JobRegistry.js';
import { RendererLauncher } from './infrastructure/process/RendererLauncher.js';
import { FrameRateConverter } from './infrastructure/process/FrameRateConverter.js';
import { FileWorkspaceStore } from './infrastructure/storage/FileWorkspaceStore.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { RenderOrchestrator } from './application/services/RenderOrchestrator.js';
import { errorMessage } from './core/errors/OrchestratorError.js';

const INTERRUPTED_MESSAGE = 'Interrupted by server restart.';

async function main() {
  let database: DatabaseConnection | null = null;
  let webServer: WebServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    database = new DatabaseConnection(config.storage.databasePath);
    const repository = new RenderRepository(database.getDatabase());

    const interrupted = repository.failInterrupted(INTERRUPTED_MESSAGE);
    if (interrupted > 0) {
      console.error(`⚠️ Marked ${interrupted} interrupted render(s) from a previous run as failed`);
    }

    const launcher = new RendererLauncher({ ...config.renderer, debug: config.server.debug });
    try {
      console.error(`🎬 Renderer resolved to ${launcher.resolveExecutable()}`);
    } catch (error) {
      console.error(`⚠️ ${errorMessage(error)} Submissions will fail until it is installed.`);
    }

    const orchestrator = new RenderOrchestrator(
      {
        render: config.render,
        limits: config.limits,
        storageRoot: config.storage.root,
        retentionMinutes: config.storage.retentionMinutes,
        debug: config.server.debug,
      },
      {
        registry: new JobRegistry(config.eta),
        launcher,
        postProcessor: new FrameRateConverter(config.encoder.binary),
        store: new FileWorkspaceStore(),
        repository,
      }
    );

    webServer = new WebServer(orchestrator, database, {
      port: config.server.backendPort,
      maxUploadBytes: config.limits.maxUploadBytes,
      version: config.server.version,
    });
    await webServer.start();

    const sweepTimer = setInterval(() => {
      orchestrator.sweep().catch((error) => {
        console.error(`[Sweeper] Sweep failed: ${errorMessage(error)}`);
      });
    }, config.storage.sweepIntervalSeconds * 1000);
    sweepTimer.unref();

    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    // Setup graceful shutdown
    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      clearInterval(sweepTimer);
      await orchestrator.shutdown();

      if (webServer) {
        await webServer.stop();
      }
      database?.close();

      console.log('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => {
      shutdown('SIGINT').catch((error) => {
        console.error('💥 Shutdown failed:', error);
        process.exit(1);
      });
    });
    process.on('SIGTERM', () => {
      shutdown('SIGTERM').catch((error) => {
        console.error('💥 Shutdown failed:', error);
        process.exit(1);
      });
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    // Cleanup on error
    if (webServer) {
      await webServer.stop();
    }
    database?.close();

    process.exit(1);
  }
}

// Start the server
main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
