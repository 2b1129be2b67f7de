import 'dotenv/config';
import { Server } from 'http';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config/env';
import { TestProjectRepository } from './repositories/testProjectRepository';
import { TestProjectService } from './services/testProjectService';
import { ErrorReporter, reportStartupFailure } from './reporting/errorReporter';

export function failStartup(error: unknown, config: AppConfig, reporter: ErrorReporter) {
  reportStartupFailure(error, config, reporter);
  // The pending delivery keeps the process alive until it settles or times out.
  process.exitCode = 1;
}

export function startServer(
  config: AppConfig,
  reporter: ErrorReporter,
  projectService: TestProjectService = new TestProjectService(new TestProjectRepository(config))
): Server {
  const app = createApp({ config, reporter, projectService });

  console.warn('[Server] Starting Backend API...');
  const server = app.listen(config.port, config.host, () => {
    console.warn(`[Server] Starting server on ${config.host}:${config.port}`);
  });
  server.on('error', (error) => failStartup(error, config, reporter));
  return server;
}

/**
 * Stop accepting connections, let in-flight error reports settle, then
 * re-raise the signal so the process still ends by it.
 */
export async function shutdown(
  server: Server,
  reporter: ErrorReporter,
  signal: NodeJS.Signals,
  raise: (signal: NodeJS.Signals) => void = (received) => process.kill(process.pid, received)
): Promise<void> {
  console.warn(`[Server] Application shutdown requested (${signal})`);
  await new Promise<void>((resolve) => {
    server.close((closeError) => {
      if (closeError) {
        console.error('[Server] Error while closing server:', closeError);
      }
      resolve();
    });
    server.closeIdleConnections();
  });
  await reporter.whenIdle();
  console.warn('[Server] Shutting down Backend API...');
  raise(signal);
}

function main() {
  const config = loadConfig();
  const reporter = new ErrorReporter(config);

  try {
    const server = startServer(config, reporter);
    const onSignal = (signal: NodeJS.Signals) => {
      shutdown(server, reporter, signal).catch((error: unknown) => {
        console.error('[Server] Shutdown failed:', error);
        process.exitCode = 1;
      });
    };
    // `once`: a second signal falls through to Node's default handler.
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  } catch (error) {
    failStartup(error, config, reporter);
  }
}

if (require.main === module) {
  main();
}
