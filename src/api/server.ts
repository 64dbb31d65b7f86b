import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { PolicyEngine, createPolicyEngine } from '../core/engine';
import { Logger, defaultLogger } from '../core/logger';
import { isMapping } from '../core/schema-node';
import { VERSION } from '../version';

/**
 * Create the Warden API router
 */
export function createApiRouter(engine: PolicyEngine): Router {
  const router = Router();

  // Middleware to parse JSON
  router.use(express.json({ limit: '1mb' }));

  /**
   * GET /v0/policy.json
   * The composite schema, for editors and linters
   */
  const schemaHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json(engine.getSchema());
  };
  router.get('/v0/policy.json', schemaHandler);

  /**
   * GET /vocabulary
   * Actions and filters available on every resource type
   */
  const vocabularyHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json(engine.vocabulary());
  };
  router.get('/vocabulary', vocabularyHandler);

  /**
   * GET /vocabulary/:resource
   */
  const resourceHandler: RequestHandler = (req: Request, res: Response): void => {
    const vocab = engine.vocabulary();
    const name = req.params.resource;
    if (!Object.prototype.hasOwnProperty.call(vocab, name)) {
      res.status(404).json({
        error: 'Not found',
        message: `${name} is not a valid resource`,
      });
      return;
    }
    res.json(vocab[name]);
  };
  router.get('/vocabulary/:resource', resourceHandler);

  /**
   * POST /validate
   * Validate a policy document
   */
  const validateHandler: RequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    try {
      const document: unknown = req.body;
      if (!isMapping(document)) {
        res.status(400).json({
          error: 'Invalid request',
          message: 'Request body must be a policy document (a JSON object)',
        });
        return;
      }

      const errors = engine.validate(document);
      const diagnosis = errors.length > 0 ? engine.diagnose(document, errors) : undefined;
      res.json({
        id: uuidv4(),
        valid: errors.length === 0,
        errors,
        ...(diagnosis ? { diagnosis } : {}),
      });
    } catch (error) {
      next(error);
    }
  };
  router.post('/validate', validateHandler);

  return router;
}

/**
 * Create a full Express application with the Warden API
 */
export function createApp(
  engine?: PolicyEngine,
  logger: Logger = defaultLogger
): express.Application {
  const app = express();
  const instance = engine ?? createPolicyEngine(undefined, logger);

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: 'warden' });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 'Warden',
      version: VERSION,
      description: 'Policy schema validation',
      endpoints: {
        schema: 'GET /v0/policy.json',
        vocabulary: 'GET /vocabulary',
        resource: 'GET /vocabulary/:resource',
        validate: 'POST /validate',
      },
    });
  };
  app.get('/', rootHandler);

  app.use(createApiRouter(instance));

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    logger.error(`[Warden] Error: ${err.message}`);
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the Warden server
 */
export function startServer(
  port: number = 3000,
  engine?: PolicyEngine,
  logger: Logger = defaultLogger
): Promise<ReturnType<express.Application['listen']>> {
  return new Promise((resolve) => {
    const app = createApp(engine, logger);
    const server = app.listen(port, () => {
      logger.log(`[Warden] Server running at http://localhost:${port}`);
      logger.log(`[Warden] Schema available at http://localhost:${port}/v0/policy.json`);
      resolve(server);
    });
  });
}
