import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as dotenv from 'dotenv';
import { loadParsingConfig } from './config/parsingConfig.js';
import { ExamParsingPipeline } from './services/parsing/ExamParsingPipeline.js';
import { createExamResultStore } from './services/storage/createExamResultStore.js';
import type { ExamResultStore } from './services/storage/ExamResultStore.js';
import { ParsingController } from './controllers/ParsingController.js';
import { createParsingRouter } from './routes/parsingRouter.js';
import { ErrorHandler } from './utils/errorHandler.js';

// Load environment variables from .env.local
dotenv.config({ path: '.env.local' });

const DEFAULT_PORT = parseInt(process.env['PORT'] || '5001', 10);

export interface AppDependencies {
  pipeline: ExamParsingPipeline;
  store: ExamResultStore;
}

export function createApp({ pipeline, store }: AppDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS configuration
  const origins = (process.env['CORS_ORIGINS'] || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
  app.use(cors({
    origin: origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type']
  }));

  // Body parsing middleware; exam text can be large
  app.use(express.json({ limit: '10mb' }));

  const controller = new ParsingController(pipeline, store);
  app.use('/api/parsing', createParsingRouter(controller));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'OK', store: store.name, timestamp: new Date().toISOString() });
  });

  // API info endpoint
  app.get('/api', (_req, res) => {
    res.json({
      name: 'Exam Question Parser API',
      version: '1.0.0',
      description: 'Segments exam text into typed, scored and deduplicated question records',
      endpoints: {
        parse: 'POST /api/parsing/exams',
        list: 'GET /api/parsing/exams',
        get: 'GET /api/parsing/exams/:examId',
        health: '/health'
      }
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handling middleware (malformed JSON bodies end up here)
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error(ErrorHandler.getLogMessage(err, 'Request'));
    const isBadBody = err instanceof SyntaxError;
    res.status(isBadBody ? 400 : 500).json({
      success: false,
      error: isBadBody ? 'Malformed JSON body' : 'Internal server error'
    });
  });

  return app;
}

function startServer(port: number): void {
  const pipeline = new ExamParsingPipeline(loadParsingConfig());
  const store = createExamResultStore();
  const app = createApp({ pipeline, store });

  const server = app.listen(port, () => {
    console.log(`🚀 Exam parser listening on port ${port} (store: ${store.name})`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`❌ Port ${port} is already in use. Please kill the process using port ${port} and try again.`);
      process.exit(1);
    }
    console.error('❌ Server error:', err);
    throw err;
  });
}

// Start the server only when run directly
if (require.main === module) {
  try {
    startServer(DEFAULT_PORT);
  } catch (error) {
    console.error(ErrorHandler.getLogMessage(error, 'Startup'));
    process.exit(1);
  }
}

export default createApp;
