import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from './config/env';
import { ErrorReporter } from './reporting/errorReporter';
import { TestProjectService } from './services/testProjectService';
import { createTestProjectsRouter } from './routes/testProjects';
import { createErrorHandler } from './middleware/errorHandler';
import { auditLog } from './middleware/audit';
import openApiDocument from '../openapi.json';

export interface AppDependencies {
  config: AppConfig;
  reporter: ErrorReporter;
  projectService: TestProjectService;
}

export function createApp({ config, reporter, projectService }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());
  app.use(auditLog);

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: 'Backend API is running',
      status: 'ok',
      swagger: '/docs',
      api: '/api/test',
    });
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'healthy', service: 'Backend API' });
  });

  app.get('/swagger', (req: Request, res: Response) => {
    res.redirect(307, '/docs');
  });

  app.get('/docs', (req: Request, res: Response) => {
    res.json(openApiDocument);
  });

  // Routes
  app.use('/api/test', createTestProjectsRouter(projectService));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Error handling middleware: must come after every route to see their faults
  app.use(createErrorHandler(reporter, config));

  return app;
}
