import 'dotenv/config';
import { initializeDatabase, checkDatabaseHealth, closeDatabaseConnection } from './modules/database/index.js';
import { createApp } from './modules/api/index.js';
import { loadConfig, loadWeeklySchedule, loadWorkflowSettings, PostgresSettingsStore } from './modules/config/index.js';
import { createCollaborators } from './modules/collaborators/index.js';
import { PostgresUploadLedger } from './modules/ledger/index.js';
import { CronTicker, ScheduleTable, WorkflowScheduler } from './modules/scheduler/index.js';
import { ProgressChannel, WorkflowRunner, type ProgressEvent } from './modules/workflow/index.js';

/**
 * Console view of the progress channel
 */
function logProgressEvent(event: ProgressEvent): void {
  if (event.type === 'step') {
    console.log(`[Progress] ${event.step}: ${event.percent}% ${event.message}`);
  } else if (event.status === 'failed') {
    const { failedStep, error } = event.summary;
    console.log(`[Progress] Run failed at ${failedStep ?? 'unknown step'}: ${error?.message ?? 'unknown error'}`);
  } else {
    console.log(`[Progress] Run succeeded: ${event.summary.url ?? event.summary.identifier ?? ''}`);
  }
}

/**
 * Application entry point
 *
 * Starts the workflow runner, the weekly scheduler and the HTTP API.
 */
async function main() {
  console.log('Starting Content Autopilot...');

  try {
    const config = loadConfig();

    // Initialize database connection
    await initializeDatabase();

    // Verify database is healthy
    const isHealthy = await checkDatabaseHealth();
    if (!isHealthy) {
      throw new Error('Database health check failed');
    }

    console.log('Database module initialized successfully');

    const settings = new PostgresSettingsStore();
    const ledger = new PostgresUploadLedger();
    const schedule = new ScheduleTable(await loadWeeklySchedule(settings));

    const progress = new ProgressChannel();
    progress.subscribe(logProgressEvent);

    const runner = new WorkflowRunner({
      collaborators: createCollaborators(config),
      ledger,
      loadSettings: () => loadWorkflowSettings(settings),
      sink: progress,
    });

    // Start the weekly scheduler
    let scheduler: WorkflowScheduler | null = null;
    if (config.scheduler.enabled) {
      scheduler = new WorkflowScheduler({
        schedule,
        ledger,
        ticker: new CronTicker(config.scheduler.pollExpression),
        onTrigger: (kind) => {
          // The scheduler already checked the ledger for today
          runner.run(kind, { skipDedupCheck: true }).catch((err) => {
            console.error('[Scheduler] Scheduled run did not start:', err);
          });
        },
      });
      scheduler.start();
      console.log('Workflow scheduler started');
    } else {
      console.log('Workflow scheduler disabled (SCHEDULER_ENABLED=false)');
    }

    // Create Express app with API routes
    const app = createApp({
      services: {
        runner,
        scheduler,
        schedule,
        progress,
        settings,
        ledger,
        checkHealth: checkDatabaseHealth,
      },
      enableCors: true,
      enableLogging: config.nodeEnv !== 'test',
    });

    // Start HTTP server
    const server = app.listen(config.port, () => {
      console.log(`Content Autopilot running on http://localhost:${config.port}`);
      console.log('\nAPI Endpoints:');
      console.log('  GET    /health                        - Database health');
      console.log('  GET    /api/status                    - Scheduler and workflow state');
      console.log('  POST   /api/status/trigger-pipeline   - Start a manual run');
      console.log('  GET    /api/status/events?after=N     - Progress events');
      console.log('  GET    /api/settings                  - Get settings');
      console.log('  PUT    /api/settings                  - Update settings');
      console.log('  GET    /api/uploads?limit=N           - Recent uploads');
      console.log('\nDatabase scripts:');
      console.log('  npm run db:generate  - Generate migrations from schema changes');
      console.log('  npm run db:migrate   - Run migrations');
      console.log('  npm run db:seed      - Seed default settings');
      console.log('  npm run db:studio    - Open Drizzle Studio for database inspection');

      // Log scheduler status
      if (scheduler) {
        const state = scheduler.getState();
        console.log('\nScheduler:');
        console.log(`  Status: ${state.status}`);
        console.log(`  Next run: ${state.nextRunDescription}`);
      }
    });

    // Graceful shutdown handling
    let shuttingDown = false;
    const shutdown = (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`\nReceived ${signal}. Shutting down gracefully...`);

      // Stop the scheduler first so no new run starts
      scheduler?.stop();

      if (runner.isRunning()) {
        console.log('Waiting for the active workflow run to finish...');
      }

      const serverClosed = new Promise<void>((resolve) => {
        server.close(() => {
          console.log('HTTP server closed.');
          resolve();
        });
      });

      // The ledger write happens inside the run, so the pool stays open until it settles
      const runSettled = runner.whenIdle().then(() => {
        // Force exit 10 seconds after the last run finished
        setTimeout(() => {
          console.error('Forced shutdown after timeout');
          process.exit(1);
        }, 10000).unref();
      });

      // A request still open on a kept-alive connection may have started another run
      Promise.all([serverClosed, runSettled])
        .then(() => runner.whenIdle())
        .then(() => closeDatabaseConnection())
        .then(() => {
          console.log('Database connection closed.');
          process.exit(0);
        })
        .catch((error) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start application:', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
